// Process Supervisor
// start/stop/restart/status for exactly one detached child, identified by its bind address.
// The pid file and the listener are re-read on every call; nothing is cached between calls.

import {
  ListenerInfo,
  LivenessDetection,
  LivenessObservation,
  StartOutcome,
  StatusReport,
  StopOutcome,
  SupervisedProcess,
  SupervisorTiming,
} from '../../domain/types/process';
import { detectState, recordedPid } from '../../domain/executors/livenessDetection';
import { formatBindAddress } from '../../domain/executors/bindAddress';
import { SupervisorError } from '../../domain/errors/supervisorError';
import { PidFilePort } from '../../domain/ports/pidFile';
import { ProcessManagerPort } from '../../domain/ports/processManager';
import { ListenerProbePort } from '../../domain/ports/listenerProbe';
import { LogTailPort } from '../../domain/ports/logTail';
import { ClockPort } from '../../domain/ports/clock';
import { LoggerPort } from '../../domain/ports/logger';

const MODULE = 'Supervisor';

export interface SupervisorDependencies {
  pidFile: PidFilePort;
  processes: ProcessManagerPort;
  listeners: ListenerProbePort;
  logTail: LogTailPort;
  clock: ClockPort;
  logger: LoggerPort;
  // Pid written to the pid file while the child is being spawned
  selfPid?: number;
}

interface Inspection {
  detection: LivenessDetection;
  listener: ListenerInfo;
  processAlive: boolean;
}

export class ProcessSupervisor {
  private readonly pidFile: PidFilePort;
  private readonly processes: ProcessManagerPort;
  private readonly listeners: ListenerProbePort;
  private readonly logTail: LogTailPort;
  private readonly clock: ClockPort;
  private readonly logger: LoggerPort;
  private readonly selfPid: number;

  constructor(
    private readonly target: SupervisedProcess,
    private readonly timing: SupervisorTiming,
    deps: SupervisorDependencies
  ) {
    this.pidFile = deps.pidFile;
    this.processes = deps.processes;
    this.listeners = deps.listeners;
    this.logTail = deps.logTail;
    this.clock = deps.clock;
    this.logger = deps.logger;
    this.selfPid = deps.selfPid ?? process.pid;
  }

  /**
   * Pattern for the post-stop sweep; null when there is no command to match
   */
  get stopPattern(): string | null {
    if (this.target.stopPattern) return this.target.stopPattern;
    return this.target.command.length > 0 ? this.target.command.join(' ') : null;
  }

  /**
   * Observe pid file, process and listener, and classify
   */
  async inspect(): Promise<LivenessDetection> {
    return (await this.observe()).detection;
  }

  private async observe(): Promise<Inspection> {
    const startTime = this.clock.now();
    const pidFile = await this.pidFile.read();
    const pid = pidFile.exists && pidFile.pid !== null ? pidFile.pid : undefined;
    const processAlive = pid !== undefined ? await this.processes.isAlive(pid) : false;
    const listener = await this.listeners.probe(this.target.bindAddress);

    const observation: LivenessObservation = { pidFile, processAlive, listener, relatedPids: [] };

    // Only look up workers when the listener names owners other than the recorded pid
    if (listener.listening && pid !== undefined && processAlive && listener.pids.length > 0 && !listener.pids.includes(pid)) {
      observation.relatedPids = await this.relatedPids();
    }

    const detection = detectState(observation, { now: this.clock.now(), graceMs: this.timing.graceMs });
    this.logger.logVerbose(MODULE, 'Inspected supervised process', {
      state: detection.state,
      pid: recordedPid(observation),
      process_alive: processAlive,
      listening: listener.listening,
      listener_pids: listener.pids,
    });
    this.logger.logPerformance('[Supervisor] Inspect', this.clock.now() - startTime, { state: detection.state });
    return { detection, listener, processAlive };
  }

  async status(): Promise<StatusReport> {
    const { detection, listener, processAlive } = await this.observe();
    const command = detection.pid !== undefined && processAlive ? await this.describe(detection.pid) : null;
    return {
      state: detection.state,
      pid: detection.pid,
      pidFilePath: this.pidFile.path,
      bindAddress: this.target.bindAddress,
      listening: detection.listening,
      listenerPids: detection.listenerPids,
      listenerDetails: listener.details,
      startFailed: detection.startFailed === true,
      ...(command !== null ? { command } : {}),
      ...(detection.details !== undefined ? { details: detection.details } : {}),
    };
  }

  async start(): Promise<StartOutcome> {
    return this.attemptStart(true);
  }

  async stop(): Promise<StopOutcome> {
    const record = await this.pidFile.read();
    let stoppedPid: number | null = null;

    if (record.exists) {
      stoppedPid = record.pid;
      if (record.pid !== null) {
        this.logger.log(MODULE, `Stopping pid ${record.pid}`);
        const delivered = await this.processes.terminate(record.pid, 'SIGTERM');
        if (delivered) {
          await this.clock.sleep(this.timing.stopWaitMs);
        }
      }
      await this.pidFile.remove();
    }

    const sweptPids = await this.sweep();

    if (!record.exists) {
      this.logger.log(MODULE, 'No pid file; nothing recorded to stop');
      return { kind: 'NOT_RUNNING', sweptPids };
    }
    this.logger.logStateTransition('RUNNING', 'STOPPED', { pid: stoppedPid, swept: sweptPids });
    return { kind: 'STOPPED', pid: stoppedPid, sweptPids };
  }

  async restart(): Promise<StartOutcome> {
    await this.stop();
    return this.start();
  }

  /**
   * One pass over the observed state. `mayRetry` allows a single fresh pass when
   * another invocation's start is found dead while this one waits on it.
   */
  private async attemptStart(mayRetry: boolean): Promise<StartOutcome> {
    const { detection, listener } = await this.observe();

    switch (detection.state) {
      case 'RUNNING': {
        const pid = this.requirePid(detection);
        this.logger.log(MODULE, `Already running with pid ${pid}`);
        return { kind: 'ALREADY_RUNNING', pid };
      }

      case 'STARTING':
        return this.awaitExistingStart(this.requirePid(detection), mayRetry);

      case 'PORT_CONFLICT': {
        const { pid: recoveredStalePid } = await this.clearIfStale();
        return this.conflictOutcome(detection, listener, recoveredStalePid);
      }

      case 'STALE': {
        const cleared = await this.clearIfStale();
        if (cleared.removed) {
          this.logger.logStateTransition('STALE', 'STOPPED', { pid: cleared.pid, details: detection.details });
        }
        return this.launch(mayRetry, cleared.pid);
      }

      case 'STOPPED':
        return this.launch(mayRetry);
    }
  }

  private async launch(mayRetry: boolean, recoveredStalePid?: number): Promise<StartOutcome> {
    if (this.target.command.length === 0) {
      throw new SupervisorError('INVALID_CONFIG', 'No command configured to launch');
    }

    // Claim the pid file with our own pid before spawning: a concurrent start sees a
    // live pid with no listener (STARTING) instead of an empty slot.
    const claimed = await this.pidFile.createExclusive(this.selfPid);
    if (!claimed) {
      this.logger.log(MODULE, 'Pid file was claimed by another invocation');
      return this.afterLostClaim(mayRetry);
    }

    let pid: number;
    try {
      pid = await this.processes.spawnDetached({
        command: this.target.command,
        cwd: this.target.cwd,
        logPath: this.target.logPath,
      });
    } catch (error) {
      await this.pidFile.remove();
      throw error;
    }
    await this.pidFile.write(pid);
    this.logger.logStateTransition('STOPPED', 'STARTING', { pid, command: this.target.command });

    const result = await this.waitForListener(pid);
    if (result.listening) {
      this.logger.logStateTransition('STARTING', 'RUNNING', { pid, waited_ms: result.waitedMs });
      return { kind: 'STARTED', pid, ...(recoveredStalePid !== undefined ? { recoveredStalePid } : {}) };
    }

    return this.timeoutOutcome(pid, result.waitedMs, result.childExited, recoveredStalePid);
  }

  private async afterLostClaim(mayRetry: boolean): Promise<StartOutcome> {
    const { detection, listener } = await this.observe();
    switch (detection.state) {
      case 'RUNNING':
      case 'STARTING':
        return this.awaitExistingStart(this.requirePid(detection), mayRetry);
      case 'PORT_CONFLICT':
        return this.conflictOutcome(detection, listener);
      case 'STALE':
      case 'STOPPED':
        // The other invocation gave up between its claim and our read
        if (mayRetry) return this.attemptStart(false);
        throw new SupervisorError('PID_FILE_IO', `Pid file ${this.pidFile.path} changed while starting; retry`);
    }
  }

  /**
   * Another invocation holds the pid file and its process has not bound yet.
   * Give it one grace period rather than spawning a second child.
   */
  private async awaitExistingStart(pid: number, mayRetry: boolean): Promise<StartOutcome> {
    const startTime = this.clock.now();
    const deadline = startTime + this.timing.graceMs;
    let current = pid;

    for (;;) {
      const { detection, listener } = await this.observe();
      switch (detection.state) {
        case 'RUNNING': {
          const runningPid = this.requirePid(detection);
          this.logger.log(MODULE, `Already running with pid ${runningPid}`);
          return { kind: 'ALREADY_RUNNING', pid: runningPid };
        }
        case 'PORT_CONFLICT':
          return this.conflictOutcome(detection, listener);
        case 'STALE':
        case 'STOPPED':
          if (mayRetry) {
            this.logger.log(MODULE, `Start by pid ${current} did not survive; starting afresh`);
            return this.attemptStart(false);
          }
          return this.timeoutOutcome(current, this.clock.now() - startTime, true);
        case 'STARTING':
          current = this.requirePid(detection);
          break;
      }
      if (this.clock.now() >= deadline) {
        return this.timeoutOutcome(current, this.timing.graceMs, false);
      }
      await this.clock.sleep(this.timing.pollMs);
    }
  }

  private conflictOutcome(
    detection: LivenessDetection,
    listener: ListenerInfo,
    recoveredStalePid?: number
  ): StartOutcome {
    this.logger.logWarning(MODULE, `Port ${formatBindAddress(this.target.bindAddress)} already in use. Refusing to start.`, {
      listener_pids: detection.listenerPids,
    });
    return {
      kind: 'PORT_CONFLICT',
      listenerPids: detection.listenerPids,
      listenerDetails: listener.details,
      ...(recoveredStalePid !== undefined ? { recoveredStalePid } : {}),
    };
  }

  private async waitForListener(pid: number): Promise<{ listening: boolean; waitedMs: number; childExited: boolean }> {
    const startTime = this.clock.now();
    const deadline = startTime + this.timing.graceMs;

    for (;;) {
      await this.clock.sleep(this.timing.pollMs);
      const listener = await this.listeners.probe(this.target.bindAddress);
      const waitedMs = this.clock.now() - startTime;
      if (listener.listening) {
        return { listening: true, waitedMs, childExited: false };
      }
      if (!(await this.processes.isAlive(pid))) {
        return { listening: false, waitedMs, childExited: true };
      }
      if (this.clock.now() >= deadline) {
        return { listening: false, waitedMs, childExited: false };
      }
    }
  }

  private async timeoutOutcome(
    pid: number,
    waitedMs: number,
    childExited: boolean,
    recoveredStalePid?: number
  ): Promise<StartOutcome> {
    // Pid file stays in place so the failed start can be diagnosed
    const logTail = await this.logTail.tail(this.target.logPath, this.timing.tailLines);
    this.logger.logError(
      MODULE,
      `pid ${pid} ${childExited ? 'exited before binding' : 'did not bind'} ${formatBindAddress(this.target.bindAddress)}`
    );
    return {
      kind: 'START_TIMEOUT',
      pid,
      waitedMs,
      childExited,
      logTail,
      ...(recoveredStalePid !== undefined ? { recoveredStalePid } : {}),
    };
  }

  /**
   * Remove the pid file if it points at nothing. The removal only succeeds if the
   * content is still what was judged stale; a record claimed by another
   * invocation in the meantime stays.
   */
  private async clearIfStale(): Promise<{ removed: boolean; pid?: number }> {
    const record = await this.pidFile.read();
    if (!record.exists) return { removed: false };
    if (record.pid !== null && (await this.processes.isAlive(record.pid))) return { removed: false };

    if (!(await this.pidFile.discardIfUnchanged(record.raw))) {
      this.logger.log(MODULE, 'Pid file changed before the stale record could be removed');
      return { removed: false };
    }
    this.logger.logWarning(MODULE, 'Removed stale pid file', { pid_file: this.pidFile.path, pid: record.pid });
    return record.pid !== null ? { removed: true, pid: record.pid } : { removed: true };
  }

  private async describe(pid: number): Promise<string | null> {
    try {
      return await this.processes.describe(pid);
    } catch (error) {
      this.logger.logWarning(MODULE, `Cannot read the command line of pid ${pid}`, { error: String(error) });
      return null;
    }
  }

  private async relatedPids(): Promise<number[]> {
    const pattern = this.stopPattern;
    if (!pattern) return [];
    return this.processes.listFromCommand(pattern);
  }

  /**
   * Best-effort: signal anything still matching the launch command (worker processes).
   * Failures are logged, not raised.
   */
  private async sweep(): Promise<number[]> {
    const pattern = this.stopPattern;
    if (!pattern) return [];

    let candidates: number[];
    try {
      candidates = await this.processes.listFromCommand(pattern);
    } catch (error) {
      this.logger.logError(MODULE, `Sweep lookup failed for '${pattern}'`, error);
      return [];
    }

    const swept: number[] = [];
    for (const pid of candidates) {
      try {
        if (await this.processes.terminate(pid, 'SIGTERM')) {
          swept.push(pid);
        }
      } catch (error) {
        this.logger.logError(MODULE, `Sweep could not signal pid ${pid}`, error);
      }
    }
    if (swept.length > 0) {
      this.logger.log(MODULE, `Swept leftover processes: ${swept.join(', ')}`);
    }
    return swept;
  }

  private requirePid(detection: LivenessDetection): number {
    if (detection.pid === undefined) {
      throw new SupervisorError('PID_FILE_IO', `State ${detection.state} reported without a pid`);
    }
    return detection.pid;
  }
}
