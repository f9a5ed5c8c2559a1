/**
 * @synthctl/runtime-host
 *
 * Everything that touches the outside world: the home directory and its
 * files, API profiles, test configuration files, the selection log and
 * the HTTP clients for the synthetics and device inventory APIs.
 */

// Home and state
export type { ResolveHomeOptions } from './home.js';
export { HOME_ENV, resolveHome } from './home.js';
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';

// Configuration
export type { Profile, ResolvedProfile } from './config/profile.js';
export {
  DEFAULT_API_URL,
  DEFAULT_INVENTORY_URL,
  DEFAULT_PROFILE,
  EMAIL_ENV,
  loadProfile,
  maskToken,
  ProfileSchema,
  readProfile,
  TOKEN_ENV,
  writeProfile,
} from './config/profile.js';
export type { ConfigFormat } from './config/test-config.js';
export { compileTestConfig, formatOf, loadTestConfig, parseTestConfig } from './config/test-config.js';
export { issuePath, toConfigurationError } from './config/issues.js';

// Logging
export { FileLogSink, SELECTION_LOG } from './logging/file-log-sink.js';
export type {
  LogReadResult,
  LogReadStats,
  SelectionFilter,
  SelectionRecord,
} from './logging/log-reader.js';
export { filterSelections, readLog, SelectionRecordSchema } from './logging/log-reader.js';
export type { UlidOptions } from './logging/ulid.js';
export { ulid, ulidFactory } from './logging/ulid.js';

// API
export { ApiRequestError, UnexpectedResponseError } from './api/errors.js';
export type { ApiCredentials, HttpClientOptions } from './api/http-client.js';
export { createHttpClient, HTTP_SUCCESS_CODES, HTTP_TIMEOUT_MS, successBody } from './api/http-client.js';
export type { HttpMethod, Operation, OperationName, RequestArgs, SynthTransport } from './api/transport.js';
export { ENDPOINTS, isOperationName, OPERATIONS, SynthHttpTransport } from './api/transport.js';
export { parseRemoteTest, RemoteTestSchema } from './api/schemas.js';
export { SynthClient } from './api/synth-client.js';
export { DeviceInventoryClient } from './api/inventory-client.js';
export { ApiInventorySource } from './api/inventory-source.js';
export type { ApiClients, ConnectOptions } from './api/connect.js';
export { connect } from './api/connect.js';
