/**
 * In-process stand-in for the GRASS modules: records every invocation and
 * answers with scripted output.
 */
import { PassThrough } from "node:stream";
import type { BridgeConfig } from "../../config.js";
import type { FedTool, ToolEnv, ToolInvocation, ToolOutput, ToolRunner } from "../executor.js";

export interface RecordedCall {
  kind: "capture" | "feed";
  tool: string;
  args: string[];
  env?: ToolEnv;
  /** Text written to stdin (feed only). */
  input: string;
}

export class FakeRunner implements ToolRunner {
  public readonly calls: RecordedCall[] = [];
  public readonly killed: NodeJS.Signals[] = [];
  /** Exit status of fed tools once their stdin closes. */
  public feedExitCode = 0;
  /** When set, fed tools only exit through exit() or kill. */
  public holdFeeds = false;

  private readonly outputs = new Map<string, Partial<ToolOutput>>();
  private readonly pending: Array<(code: number) => void> = [];

  on(tool: string, output: Partial<ToolOutput>): this {
    this.outputs.set(tool, output);
    return this;
  }

  callsTo(tool: string): RecordedCall[] {
    return this.calls.filter((c) => c.tool === tool);
  }

  /** Make the n-th fed tool exit. */
  exit(index: number, code: number): void {
    this.pending[index](code);
  }

  async capture(invocation: ToolInvocation): Promise<ToolOutput> {
    this.calls.push({ kind: "capture", tool: invocation.tool, args: invocation.args, env: invocation.env, input: "" });
    const output = this.outputs.get(invocation.tool) ?? {};
    return {
      stdout: output.stdout ?? "",
      stderr: output.stderr ?? "",
      exitCode: output.exitCode ?? 0,
    };
  }

  feed(invocation: ToolInvocation): FedTool {
    const call: RecordedCall = {
      kind: "feed",
      tool: invocation.tool,
      args: invocation.args,
      env: invocation.env,
      input: "",
    };
    this.calls.push(call);

    const stdin = new PassThrough();
    stdin.setEncoding("utf8");
    stdin.on("data", (chunk: string) => {
      call.input += chunk;
    });

    let finish: (code: number) => void = () => undefined;
    const exited = new Promise<number>((resolve) => {
      finish = resolve;
    });
    this.pending.push((code) => finish(code));
    if (!this.holdFeeds) stdin.on("end", () => finish(this.feedExitCode));

    return {
      pid: 4242 + this.pending.length - 1,
      stdin,
      exited,
      kill: (signal = "SIGTERM") => {
        this.killed.push(signal);
        finish(143);
        return true;
      },
    };
  }
}

export function testConfig(overrides: Partial<BridgeConfig> = {}): BridgeConfig {
  return { toolTimeoutMs: 0, toolDir: "", locale: "en", debug: false, ...overrides };
}

/** Let pending stream and promise callbacks run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
