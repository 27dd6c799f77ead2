/**
 * @syncprobe/core
 *
 * Error taxonomy shared by the probe layer and the apps.
 */

export {
  SyncProbeError,
  ValidationError,
  ProbeExecutionError,
  ProbeOutputError,
  InternalError,
  type ProbeExecutionDetails,
} from './errors/index.js';
