export {
  FakeRunner,
  reply,
  fileListPath,
  VALID_ACCOUNT_REPLY,
  PRIVATE_ACCOUNT_REPLY,
  SERVER_ADDRESS_REPLY,
  TEST_SETTINGS,
  TEST_SESSION,
  REMOTE_HOME,
  type RecordedInvocation,
  type Reply,
} from "./fake-runner.js";
