export { OptimisticActionController } from "./actions";
export type { ActionOutcome, OptimisticActionControllerOptions } from "./actions";
export { EMPTY_CONTROL, displayValue, isPending, reduceControl } from "./control-state";
export type { ControlEvent, ControlValue, PendingControl } from "./control-state";
export {
  CONTROLS,
  GROWTH_PHASES,
  HUMIDIFIER_CONTROLS,
  PHASE_CONTROL,
  PID_CONTROLS,
  controlValuesFromSettings,
  findControl,
  isGrowthPhase,
  phaseSetpointControl,
  phaseSetpointControls,
  validateControlValue
} from "./controls";
export type { ControlDefinition, ControlOption, GrowthPhase, PhaseSetpoint } from "./controls";
export {
  INITIAL_STREAM_SNAPSHOT,
  LOG_STREAM_PATH,
  ReconnectingEventStream,
  eventSourceConnector,
  retryDelay,
  transitionStream
} from "./event-stream";
export type {
  ReconnectingEventStreamOptions,
  StreamConnector,
  StreamEvent,
  StreamHandlers,
  StreamListener,
  StreamSnapshot,
  StreamState,
  StreamSubscription
} from "./event-stream";
export { BoundedLogBuffer, DEFAULT_LOG_CAPACITY } from "./log-buffer";
export type { LogListener, LogSink } from "./log-buffer";
export { HEARTBEAT_LINE, createMockBackend } from "./mock";
export type { MockBackend, MockBackendOptions } from "./mock";
export { RequestError, TimeoutError, createRestClient, parseStatus } from "./rest";
export type {
  ControlTransport,
  ControlUpdate,
  RestClient,
  RestClientOptions,
  SettingsDocument,
  SystemAction,
  SystemStatus
} from "./rest";
export {
  createDashboardStore,
  selectConnection,
  selectControl,
  selectLogs,
  selectStatus,
  selectStatusError
} from "./store";
export type { DashboardState, DashboardStore } from "./store";
