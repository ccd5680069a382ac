/**
 * executor.ts — GRASS module executor
 *
 * Runs GRASS modules (r.info, r.mapcalc, ...) as child processes.
 * Everything above this file talks to a ToolRunner, so tests can swap the
 * process layer for a scripted fake.
 */

import { execFile, spawn } from "node:child_process";
import { constants } from "node:os";
import { join } from "node:path";
import type { Writable } from "node:stream";
import { promisify } from "node:util";
import { loadConfig, type BridgeConfig } from "../config.js";
import { ToolExecutionError, ToolNotFoundError, ToolTimeoutError } from "../errors.js";
import { log } from "../ui/terminal.js";
import { buildToolArgs, type ToolParams } from "./params.js";

const exec = promisify(execFile);

// ─── Types ───────────────────────────────────────────────

/** Variables layered over process.env for one invocation. */
export type ToolEnv = Readonly<Record<string, string | undefined>>;

export interface ToolInvocation {
  tool: string;
  args: string[];
  env?: ToolEnv;
  /** 0 or absent: no timeout. Only honoured by `capture`. */
  timeoutMs?: number;
}

export interface ToolOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/** A started tool whose stdin is still open for writing. */
export interface FedTool {
  readonly pid: number | undefined;
  readonly stdin: Writable;
  /** Resolves with the exit status once the process has closed. */
  readonly exited: Promise<number>;
  kill(signal?: NodeJS.Signals): boolean;
}

export interface ToolRunner {
  /** Run to completion and capture output. Resolves on any exit status. */
  capture(invocation: ToolInvocation): Promise<ToolOutput>;
  /** Start with stdin piped and stdout/stderr inherited. Does not wait. */
  feed(invocation: ToolInvocation): FedTool;
}

export interface InvokeOptions {
  runner?: ToolRunner;
  env?: ToolEnv;
  config?: BridgeConfig;
}

// ─── Process Runner ──────────────────────────────────────

function mergeEnv(env?: ToolEnv): NodeJS.ProcessEnv {
  return env ? { ...process.env, ...env } : process.env;
}

function errorField(err: Error, name: string): unknown {
  return name in err ? Reflect.get(err, name) : undefined;
}

function signalStatus(signal: string | null): number {
  const number = Object.entries(constants.signals).find(([name]) => name === signal)?.[1];
  return number === undefined ? 1 : 128 + number;
}

export const processRunner: ToolRunner = {
  async capture({ tool, args, env, timeoutMs = 0 }) {
    try {
      const { stdout, stderr } = await exec(tool, args, {
        timeout: timeoutMs,
        maxBuffer: 100 * 1024 * 1024, // r.what over many points prints a lot
        env: mergeEnv(env),
      });
      return { stdout, stderr, exitCode: 0 };
    } catch (err: unknown) {
      if (!(err instanceof Error)) throw err;
      const code = errorField(err, "code");
      if (code === "ENOENT") throw new ToolNotFoundError(tool);
      if (errorField(err, "killed") === true && timeoutMs > 0) {
        throw new ToolTimeoutError(tool, timeoutMs);
      }
      const signal = errorField(err, "signal");
      // Killed by a signal from outside (no exit code): report the shell-style status
      const exitCode =
        typeof code === "number" ? code : typeof signal === "string" ? signalStatus(signal) : undefined;
      if (exitCode === undefined) throw err;
      const stdout = errorField(err, "stdout");
      const stderr = errorField(err, "stderr");
      return {
        stdout: typeof stdout === "string" ? stdout : "",
        stderr: typeof stderr === "string" ? stderr : "",
        exitCode,
      };
    }
  },

  feed({ tool, args, env }) {
    const child = spawn(tool, args, {
      env: mergeEnv(env),
      stdio: ["pipe", "inherit", "inherit"],
    });
    const exited = new Promise<number>((resolve, reject) => {
      child.once("error", (err) => {
        reject(errorField(err, "code") === "ENOENT" ? new ToolNotFoundError(tool) : err);
      });
      child.once("close", (code, signal) => resolve(code ?? signalStatus(signal)));
    });
    return {
      pid: child.pid,
      stdin: child.stdin,
      exited,
      kill: (signal) => child.kill(signal),
    };
  },
};

// ─── Invocation Helpers ──────────────────────────────────

function prepare(tool: string, params: ToolParams, options: InvokeOptions) {
  const config = options.config ?? loadConfig();
  const invocation: ToolInvocation = {
    tool: config.toolDir ? join(config.toolDir, tool) : tool,
    args: buildToolArgs(params),
    env: options.env,
    timeoutMs: config.toolTimeoutMs,
  };
  if (config.debug) log.tool(tool, invocation.args.join(" "));
  return { runner: options.runner ?? processRunner, invocation, debug: config.debug };
}

/**
 * Write text to stdin and close it. Resolves with the write error, if any,
 * instead of rejecting: a tool that exits early closes its end of the pipe,
 * and its exit status is the better report of what went wrong.
 */
export function writeAndClose(stdin: Writable, text: string): Promise<Error | undefined> {
  return new Promise((resolve) => {
    stdin.once("error", (err) => resolve(err));
    // The end callback also fires on failure, with the error
    stdin.end(text, (err?: Error | null) => resolve(err ?? undefined));
  });
}

/** Run a tool and capture its output whatever the exit status. */
export async function captureTool(
  tool: string,
  params: ToolParams = {},
  options: InvokeOptions = {},
): Promise<ToolOutput> {
  const { runner, invocation, debug } = prepare(tool, params, options);
  const started = Date.now();
  const output = await runner.capture(invocation);
  if (debug) log.toolDone(tool, Date.now() - started);
  return output;
}

/**
 * Run a tool, wait for it and return its stdout.
 *
 * @throws ToolExecutionError on a nonzero exit status
 */
export async function readTool(
  tool: string,
  params: ToolParams = {},
  options: InvokeOptions = {},
): Promise<string> {
  const { stdout, stderr, exitCode } = await captureTool(tool, params, options);
  if (exitCode !== 0) throw new ToolExecutionError(tool, exitCode, stderr);
  return stdout;
}

/** Run a tool for its side effects. */
export async function runTool(
  tool: string,
  params: ToolParams = {},
  options: InvokeOptions = {},
): Promise<void> {
  await readTool(tool, params, options);
}

/**
 * Run a tool, passing `input` on stdin, and wait for it to exit.
 *
 * @throws ToolExecutionError on a nonzero exit status
 */
export async function writeTool(
  tool: string,
  params: ToolParams,
  input: string,
  options: InvokeOptions = {},
): Promise<void> {
  const { runner, invocation, debug } = prepare(tool, params, options);
  const started = Date.now();
  const fed = runner.feed(invocation);
  const [writeError, exitCode] = await Promise.all([writeAndClose(fed.stdin, input), fed.exited]);
  if (debug) log.toolDone(tool, Date.now() - started);
  if (exitCode !== 0) throw new ToolExecutionError(tool, exitCode);
  if (writeError) throw writeError;
}

/** Start a tool with stdin open for writing; the caller owns the process. */
export function feedTool(
  tool: string,
  params: ToolParams = {},
  options: InvokeOptions = {},
): FedTool {
  const { runner, invocation } = prepare(tool, params, options);
  return runner.feed(invocation);
}
