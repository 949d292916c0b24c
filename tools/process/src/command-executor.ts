/**
 * CommandExecutor: spawns OS processes for the relay and tracks them until
 * they exit.
 *
 * execute() returns as soon as the child is spawned; exit is observed through
 * the child's events and moves the record from the live set into a bounded
 * history. Commands are tokenised with shell-quote and spawned without a
 * shell, so pipes, redirects and `&&` are rejected rather than interpreted.
 *
 * Lifecycle of a record:
 *   running ──exit──────────────▶ exited
 *   running ──kill() / timeout──▶ killed
 *
 * All table mutations happen in synchronous sections (execute, kill, the
 * child's exit handler), so no two requests see a half-updated record.
 */
import { spawn, type ChildProcess } from "node:child_process";
import * as readline from "node:readline";
import type { Readable } from "node:stream";
import type { Logger } from "pino";
import { parse as shellParse, quote as shellQuote } from "shell-quote";
import type { ExecuteConstraints, ProcessExecutor } from "lanrelay-shared/context";
import { InternalError, NotFoundError, ValidationError } from "lanrelay-shared/errors";
import type { LogEntry, ProcessRecord } from "lanrelay-shared/types";

export interface CommandExecutorOptions {
  /** Finished records kept for list()/get()/output(). */
  historyLimit?: number;
  /** Output lines kept per process (oldest dropped first). */
  outputLimit?: number;
  logger?: Logger;
}

interface TrackedProcess {
  record: ProcessRecord;
  child: ChildProcess;
  output: LogEntry[];
  stopRequested: boolean;
  timer: NodeJS.Timeout | undefined;
  /** Resolves once the child has exited and its output streams are drained. */
  closed: Promise<void>;
}

const DEFAULT_HISTORY_LIMIT = 50;
const DEFAULT_OUTPUT_LIMIT = 200;
const SHUTDOWN_GRACE_MS = 2_000;

// ── Tokenising ──────────────────────────────────────────

/**
 * Split a command line into argv. `$VAR` stays literal; globs are passed
 * through unexpanded; operators and comments are refused.
 */
export function tokenizeCommand(command: string): string[] {
  const tokens = shellParse(command, (key) => `$${key}`);
  const argv: string[] = [];

  for (const token of tokens) {
    if (typeof token === "string") {
      argv.push(token);
    } else if ("op" in token && token.op === "glob") {
      argv.push(token.pattern);
    } else {
      const shown = "op" in token ? token.op : "#";
      throw new ValidationError(["command"], `Shell operators are not supported: ${shown}`);
    }
  }
  return argv;
}

function snapshot(record: ProcessRecord): ProcessRecord {
  return Object.freeze({ ...record, argv: [...record.argv] });
}

// ── Executor ────────────────────────────────────────────

export class CommandExecutor implements ProcessExecutor {
  private readonly live = new Map<number, TrackedProcess>();
  /** Newest last. */
  private readonly history: TrackedProcess[] = [];
  private readonly historyLimit: number;
  private readonly outputLimit: number;
  private readonly logger: Logger | undefined;

  constructor(options: CommandExecutorOptions = {}) {
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.outputLimit = options.outputLimit ?? DEFAULT_OUTPUT_LIMIT;
    this.logger = options.logger?.child({ component: "executor" });
  }

  execute(command: string, args: readonly string[] = [], constraints: ExecuteConstraints = {}): ProcessRecord {
    const argv = [...tokenizeCommand(command), ...args];
    if (argv.length === 0) {
      throw new ValidationError(["command"], "Command is empty");
    }

    const [file, ...rest] = argv;
    const child = spawn(file, rest, {
      cwd: constraints.cwd,
      env: constraints.env ? { ...process.env, ...constraints.env } : process.env,
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
    });

    const pid = child.pid;
    if (pid === undefined) {
      // spawn() reports the failure asynchronously; take it here instead
      child.once("error", (err) => {
        this.logger?.debug({ err, command: file }, "spawn error after failed start");
      });
      this.logger?.warn({ command: file, cwd: constraints.cwd }, "process failed to start");
      throw new InternalError(`Failed to start '${file}'`);
    }

    const record: ProcessRecord = {
      pid,
      command: shellQuote(argv),
      argv,
      startedAt: new Date(),
      state: "running",
      exitCode: null,
      signal: null,
      endedAt: null,
    };

    const tracked: TrackedProcess = {
      record,
      child,
      output: [],
      stopRequested: false,
      timer: undefined,
      closed: new Promise<void>((resolve) => {
        child.once("close", () => resolve());
      }),
    };

    this.capture(tracked, child.stdout, "stdout");
    this.capture(tracked, child.stderr, "stderr");

    child.on("error", (err) => {
      this.logger?.error({ err, pid }, "child process error");
    });
    child.once("exit", (code, signal) => this.finish(tracked, code, signal));

    if (constraints.timeoutMs !== undefined && constraints.timeoutMs > 0) {
      tracked.timer = setTimeout(() => {
        this.logger?.warn({ pid, timeoutMs: constraints.timeoutMs }, "process timed out");
        tracked.stopRequested = true;
        child.kill("SIGTERM");
      }, constraints.timeoutMs);
      tracked.timer.unref();
    }

    this.live.set(pid, tracked);
    this.logger?.info({ pid, command: record.command }, "process started");
    return snapshot(record);
  }

  kill(pid: number, signal: NodeJS.Signals = "SIGTERM"): void {
    const tracked = this.live.get(pid);
    if (!tracked) {
      throw new NotFoundError(`Process ${pid}`);
    }

    if (!tracked.child.kill(signal)) {
      throw new NotFoundError(`Process ${pid}`);
    }
    tracked.stopRequested = true;
    this.logger?.info({ pid, signal }, "kill requested");
  }

  /** Live records in start order, then finished ones newest first. */
  list(): readonly ProcessRecord[] {
    const live = [...this.live.values()].map((t) => snapshot(t.record));
    const finished = [...this.history].reverse().map((t) => snapshot(t.record));
    return Object.freeze([...live, ...finished]);
  }

  get(pid: number): ProcessRecord | undefined {
    const tracked = this.find(pid);
    return tracked ? snapshot(tracked.record) : undefined;
  }

  output(pid: number): readonly LogEntry[] {
    const tracked = this.find(pid);
    if (!tracked) {
      throw new NotFoundError(`Process ${pid}`);
    }
    return Object.freeze(tracked.output.map((entry) => Object.freeze({ ...entry })));
  }

  /** Resolves with the final record once the process has exited and its output is drained. */
  async waitForExit(pid: number): Promise<ProcessRecord> {
    const tracked = this.find(pid);
    if (!tracked) {
      throw new NotFoundError(`Process ${pid}`);
    }
    await tracked.closed;
    return snapshot(tracked.record);
  }

  get liveCount(): number {
    return this.live.size;
  }

  /**
   * Terminate every live process: SIGTERM, then SIGKILL for anything still
   * running after the grace period.
   */
  async shutdown(graceMs = SHUTDOWN_GRACE_MS): Promise<void> {
    const pending = [...this.live.values()];
    if (pending.length === 0) return;

    this.logger?.info({ count: pending.length }, "stopping live processes");
    for (const tracked of pending) {
      tracked.stopRequested = true;
      tracked.child.kill("SIGTERM");
    }

    const escalate = setTimeout(() => {
      for (const tracked of pending) {
        if (tracked.record.state === "running") tracked.child.kill("SIGKILL");
      }
    }, graceMs);
    escalate.unref();

    await Promise.all(pending.map((t) => t.closed));
    clearTimeout(escalate);
  }

  // ── Internals ────────────────────────────────────────

  private find(pid: number): TrackedProcess | undefined {
    const live = this.live.get(pid);
    if (live) return live;
    for (let i = this.history.length - 1; i >= 0; i--) {
      if (this.history[i].record.pid === pid) return this.history[i];
    }
    return undefined;
  }

  private capture(tracked: TrackedProcess, stream: Readable | null, name: LogEntry["stream"]): void {
    if (!stream) return;
    const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
    lines.on("line", (line) => {
      tracked.output.push({ stream: name, line });
      if (tracked.output.length > this.outputLimit) tracked.output.shift();
    });
  }

  private finish(tracked: TrackedProcess, code: number | null, signal: NodeJS.Signals | null): void {
    if (tracked.timer) clearTimeout(tracked.timer);

    const record = tracked.record;
    record.state = tracked.stopRequested ? "killed" : "exited";
    record.exitCode = code;
    record.signal = signal;
    record.endedAt = new Date();

    this.live.delete(record.pid);
    this.history.push(tracked);
    while (this.history.length > this.historyLimit) this.history.shift();

    this.logger?.info({ pid: record.pid, state: record.state, code, signal }, "process finished");
  }
}
