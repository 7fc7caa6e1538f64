export {
  createRecordingSubsystems,
  InMemoryIdentityReader,
  RecordingSubsystem,
  RecordingIdentitySubsystem,
  RecordingAuthorizationSubsystem,
  RecordingAuthenticationSubsystem,
} from "./recording-subsystems";
export type {
  LifecycleAction,
  LifecycleEvent,
  TestIdentity,
  RecordingOptions,
  RecordingSubsystems,
  RecordingSubsystemTypes,
} from "./recording-subsystems";
export { RecordingLogger } from "./recording-logger";
export type { LogRecord } from "./recording-logger";
