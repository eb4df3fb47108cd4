export { TestKeypair } from './keypair.js';
export {
  TEST_EPOCH,
  TEST_STEP_MS,
  PDS_SERVICE,
  PDS_SERVICE_TYPE,
  TestLog,
  UpdateBuilder,
  TombstoneBuilder,
  type IdentityKeys,
  type TestEntry,
  type GenesisOptions,
} from './test-log.js';
