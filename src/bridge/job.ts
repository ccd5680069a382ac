/**
 * job.ts — Handle for an r.mapcalc process started without waiting
 *
 * The caller owns the handle. The expression has already been written and
 * stdin closed by the time it is returned; what remains is to `wait()` for
 * the exit status (or `terminate()` first). Two jobs share nothing, so
 * their completion order is only what their exit statuses say.
 */

import { JobStateError } from "../errors.js";
import { writeAndClose, type FedTool } from "./executor.js";

export type JobState = "running" | "exited" | "terminated";

export class MapcalcJob {
  public readonly expression: string;
  public readonly seed?: number;

  private readonly child: FedTool;
  private readonly done: Promise<number>;
  private currentState: JobState = "running";
  private status: number | null = null;
  private failure?: Error;

  constructor(child: FedTool, expression: string, seed?: number) {
    this.child = child;
    this.expression = expression;
    this.seed = seed;

    // Settles exactly once; failures are kept and rethrown from wait()
    this.done = Promise.all([writeAndClose(child.stdin, expression), child.exited]).then(
      ([writeError, code]) => {
        this.status = code;
        if (writeError && code === 0) this.failure = writeError;
        this.settle();
        return code;
      },
      (err: unknown) => {
        this.failure = err instanceof Error ? err : new Error(String(err));
        this.settle();
        return -1;
      },
    );
  }

  get state(): JobState {
    return this.currentState;
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  /** Exit status, or null while the process is still running. */
  get exitCode(): number | null {
    return this.status;
  }

  /**
   * Wait for r.mapcalc to exit and resolve with its exit status. May be
   * called any number of times.
   *
   * @throws ToolNotFoundError if the process could not be started
   */
  async wait(): Promise<number> {
    const code = await this.done;
    if (this.failure) throw this.failure;
    return code;
  }

  /** Signal a running job. The exit status still arrives through wait(). */
  terminate(signal: NodeJS.Signals = "SIGTERM"): void {
    if (this.currentState !== "running") {
      throw new JobStateError(this.currentState, "terminate");
    }
    this.currentState = "terminated";
    this.child.kill(signal);
  }

  private settle(): void {
    if (this.currentState === "running") this.currentState = "exited";
  }
}
