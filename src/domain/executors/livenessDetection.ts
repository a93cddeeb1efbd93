// Liveness Detection
// Reconciles the pid file with the listening-socket state

import { LivenessDetection, LivenessObservation, StartWindow } from '../types/process';

/**
 * Pid recorded in the pid file, if the file exists and holds a valid pid
 */
export function recordedPid(observation: LivenessObservation): number | undefined {
  const { pidFile } = observation;
  return pidFile.exists && pidFile.pid !== null ? pidFile.pid : undefined;
}

/**
 * Classify the observed state.
 *
 * A listener counts as ours only when the recorded pid is alive and the socket
 * owners are unknown, include the recorded pid, or include one of its workers.
 * Any other listener is a PORT_CONFLICT, which outranks STOPPED and STALE.
 *
 * Given a start window, a STARTING record older than the grace period is
 * flagged as a failed start.
 */
export function detectState(observation: LivenessObservation, window?: StartWindow): LivenessDetection {
  const { pidFile, listener } = observation;
  const pid = recordedPid(observation);
  const alive = pid !== undefined && observation.processAlive;

  if (listener.listening) {
    const attributable =
      pid !== undefined &&
      observation.processAlive &&
      (listener.pids.length === 0 ||
        listener.pids.includes(pid) ||
        listener.pids.some(owner => observation.relatedPids.includes(owner)));

    if (!attributable) {
      const owners = listener.pids.length > 0 ? `pid ${listener.pids.join(',')}` : 'an unknown process';
      return {
        state: 'PORT_CONFLICT',
        pid,
        listening: true,
        listenerPids: listener.pids,
        details: `Address is held by ${owners}`,
      };
    }
    return { state: 'RUNNING', pid, listening: true, listenerPids: listener.pids };
  }

  if (!pidFile.exists) {
    return { state: 'STOPPED', listening: false, listenerPids: [] };
  }

  if (pid === undefined) {
    return {
      state: 'STALE',
      listening: false,
      listenerPids: [],
      details: `Pid file content is not a pid: '${pidFile.raw.trim()}'`,
    };
  }

  if (!alive) {
    return { state: 'STALE', pid, listening: false, listenerPids: [], details: `Process ${pid} is not running` };
  }

  const ageMs = window ? window.now - pidFile.modifiedAt : 0;
  if (window && ageMs >= window.graceMs) {
    return {
      state: 'STARTING',
      pid,
      listening: false,
      listenerPids: [],
      startFailed: true,
      details: `Process ${pid} not listening ${ageMs}ms after launch (grace ${window.graceMs}ms)`,
    };
  }

  return { state: 'STARTING', pid, listening: false, listenerPids: [] };
}
