// procguard - Main Entry Point
// Exports all public APIs

// Supervisor
export { ProcessSupervisor } from './src/application/services/processSupervisor';
export type { SupervisorDependencies } from './src/application/services/processSupervisor';
export { reportStart, reportStop, reportStatus, EXIT_OK, EXIT_START_FAILED, EXIT_PORT_CONFLICT } from './src/application/services/statusReporter';
export type { Report } from './src/application/services/statusReporter';

// Types
export type {
  ProcessState,
  BindAddress,
  SupervisedProcess,
  SupervisorTiming,
  PidFileRecord,
  ListenerInfo,
  LivenessDetection,
  StartOutcome,
  StopOutcome,
  StatusReport,
  SpawnRequest,
} from './src/domain/types/process';

// Liveness Detection
export { detectState } from './src/domain/executors/livenessDetection';
export { parseBindAddress, formatBindAddress } from './src/domain/executors/bindAddress';

// Errors
export { SupervisorError, isSupervisorError } from './src/domain/errors/supervisorError';
export type { SupervisorErrorCode } from './src/domain/errors/supervisorError';

// Ports
export type { PidFilePort } from './src/domain/ports/pidFile';
export type { ProcessManagerPort } from './src/domain/ports/processManager';
export type { ListenerProbePort } from './src/domain/ports/listenerProbe';
export type { LogTailPort } from './src/domain/ports/logTail';
export type { ClockPort } from './src/domain/ports/clock';
export type { LoggerPort } from './src/domain/ports/logger';

// Adapters
export { PidFileAdapter } from './src/infrastructure/adapters/os/pidFileAdapter';
export { ProcessManagerAdapter } from './src/infrastructure/adapters/os/processManagerAdapter';
export { ListenerProbeAdapter } from './src/infrastructure/adapters/os/listenerProbeAdapter';
export { LogTailAdapter } from './src/infrastructure/adapters/os/logTailAdapter';
export { SystemClockAdapter } from './src/infrastructure/adapters/os/systemClockAdapter';
export { LoggerAdapter } from './src/infrastructure/adapters/logging/loggerAdapter';

// Configuration / CLI
export { loadConfig, splitCommandLine } from './src/config/supervisorConfig';
export type { SupervisorConfig, ConfigOverrides } from './src/config/supervisorConfig';
export { createSupervisor, createProgram, executeCommand } from './src/cli';
