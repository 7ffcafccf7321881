/**
 * Signed-request gate for mutating routes.
 *
 * Order: signature (401 invalid_signature), then nonce (409 stale_nonce).
 * A nonce is consumed once the signature checks out, whether or not the
 * operation that follows succeeds.
 */

import { verifyRequest, type SignedRequest } from "@agentledger/protocol";
import type { RouteContext } from "./context.js";

/** Rejection outside the ledger error taxonomy, with its own HTTP status. */
export class RequestRejected extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly error: string,
    message: string,
  ) {
    super(message);
    this.name = "RequestRejected";
  }
}

export async function authorize<T extends object>(
  ctx: RouteContext,
  action: string,
  request: SignedRequest<T>,
): Promise<void> {
  if (!(await verifyRequest(action, request))) {
    throw new RequestRejected(401, "invalid_signature", "Ed25519 sig verification failed");
  }
  if (!ctx.nonces.accept(request.caller, request.nonce)) {
    throw new RequestRejected(
      409,
      "stale_nonce",
      `nonce must be greater than ${ctx.nonces.current(request.caller)}`,
    );
  }
}
