export type {
  Entry,
  InsertResult,
  SensitivityChange,
  HistoryStats,
  PollerState,
  ClipboardStatus,
} from './clipboard';
export { ErrorCode, ClipTrailError } from './errors';
export type { ErrorSeverity } from './errors';
export type { ClipTrailConfig, ConfigKey } from './config';
