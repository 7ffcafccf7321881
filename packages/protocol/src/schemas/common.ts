/**
 * Shared field schemas.
 */

import { Type } from "@sinclair/typebox";
import { MAX_TEXT_LENGTH } from "../constants.js";

export const Hex32 = Type.String({ pattern: "^[0-9a-f]{64}$" });

/** Token base units. Zero is representable; operations reject it themselves. */
export const Amount = Type.Integer({ minimum: 0, maximum: Number.MAX_SAFE_INTEGER });

/** Milliseconds since the Unix epoch. */
export const Timestamp = Type.Integer({ minimum: 0 });

export const Text = Type.String({ maxLength: MAX_TEXT_LENGTH });
