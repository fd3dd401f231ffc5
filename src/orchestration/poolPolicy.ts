/**
 * Worker pool decisions
 *
 * Pure state transitions used by the supervisor: what to do when a worker
 * exits, becomes ready, or a shutdown is requested. The supervisor only
 * carries out the returned actions.
 */

/**
 * Consecutive workers that die before becoming ready before the
 * supervisor stops respawning
 */
export const MAX_BOOT_FAILURES = 5;

export type PoolState = {
  shuttingDown: boolean;
  /** Workers that exited before reporting ready, since the last ready one */
  bootFailures: number;
  /** Exit code of the supervisor once all workers are gone */
  exitCode: number;
};

export const INITIAL_POOL_STATE: PoolState = {
  shuttingDown: false,
  bootFailures: 0,
  exitCode: 0,
};

export type ExitAction =
  | { type: "respawn" }
  | { type: "give-up" }
  | { type: "wait" }
  | { type: "exit"; code: number };

export type ShutdownAction =
  | { type: "stop-workers" }
  | { type: "exit"; code: number };

export type Transition<A> = { state: PoolState; action: A };

/**
 * A worker exited
 *
 * @param booted - Whether the worker had reported ready
 * @param remaining - Workers still alive after this one
 */
export function onWorkerExit(
  state: PoolState,
  booted: boolean,
  remaining: number,
): Transition<ExitAction> {
  if (state.shuttingDown) {
    return {
      state,
      action: remaining === 0 ? { type: "exit", code: state.exitCode } : { type: "wait" },
    };
  }
  if (booted) {
    return { state, action: { type: "respawn" } };
  }

  const bootFailures = state.bootFailures + 1;
  return {
    state: { ...state, bootFailures },
    action: bootFailures >= MAX_BOOT_FAILURES ? { type: "give-up" } : { type: "respawn" },
  };
}

export function onWorkerReady(state: PoolState): PoolState {
  return { ...state, bootFailures: 0 };
}

/**
 * A signal or a boot loop asks the pool to stop
 *
 * A second request while already stopping exits at once with code 1.
 */
export function onShutdownRequest(
  state: PoolState,
  code: number,
  liveWorkers: number,
): Transition<ShutdownAction> {
  if (state.shuttingDown) {
    return { state, action: { type: "exit", code: 1 } };
  }
  const next: PoolState = { ...state, shuttingDown: true, exitCode: code };
  return {
    state: next,
    action: liveWorkers === 0 ? { type: "exit", code } : { type: "stop-workers" },
  };
}

/**
 * Exit code when workers ignored SIGTERM for the whole grace period
 */
export function graceTimeoutExitCode(state: PoolState): number {
  return state.exitCode === 0 ? 1 : state.exitCode;
}
