/**
 * @agentledger/token: token client abstraction.
 *
 * The ledger depends on TokenClient only. MemoryToken backs the service
 * and every test.
 */

export {
  isCheckpointable,
  type TokenClient,
  type Checkpointable,
  type Checkpoint,
  type TokenMetadata,
} from "./types.js";

export { MemoryToken } from "./memory-token.js";
