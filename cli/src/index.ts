/**
 * Programmatic access to a running screen-narrator daemon
 */

export {
  DaemonClient,
  DaemonRequestError,
  DaemonUnreachableError,
  DEFAULT_DAEMON_PORT,
  resolveDaemonUrl,
} from "./daemon-client.js";
export type { CommandReceipt } from "./daemon-client.js";
