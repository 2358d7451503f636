import { spawn, type ChildProcess } from "node:child_process";
import readline from "node:readline";
import type { Transport } from "./types.js";
import type { JsonRpcMessage } from "../../types.js";
import type { StdioServerConfig } from "../config/manager.js";
import { createLogger } from "../../logger.js";

const log = createLogger("stdio");

// Splits a command line into [executable, args]
export function parseCommandString(commandString: string): [string, string[]] {
  const parts = commandString.trim().split(/\s+/);
  if (parts.length === 0 || parts[0] === "") {
    throw new Error(`Invalid command string: "${commandString}"`);
  }
  return [parts[0], parts.slice(1)];
}

export class StdioTransport implements Transport {
  readonly kind = "stdio";
  private proc: ChildProcess;
  private closeListeners: Array<(reason?: Error) => void> = [];
  private closed = false;

  constructor(cfg: StdioServerConfig) {
    const [executable, args]: [string, string[]] = cfg.args ? [cfg.command, cfg.args] : parseCommandString(cfg.command);

    log.debug("Spawning upstream", { executable, args });
    this.proc = spawn(executable, args, {
      stdio: ["pipe", "pipe", "inherit"],
      shell: false,
      cwd: cfg.cwd,
      env: cfg.env ? { ...process.env, ...cfg.env } : process.env,
    });

    this.proc.on("error", (err) => {
      log.error("Failed to start subprocess", { command: cfg.command, error: err.message });
      this.finish(err);
    });

    this.proc.on("exit", (code, signal) => {
      log.info("Subprocess exited", { command: cfg.command, code, signal });
      this.finish(code === 0 || this.closed ? undefined : new Error(`Upstream exited with code ${code ?? signal}`));
    });
  }

  async send(msg: JsonRpcMessage): Promise<void> {
    const stdin = this.proc.stdin;
    if (this.closed || !stdin || stdin.destroyed) {
      throw new Error("Upstream process is not running");
    }
    const dataToSend = JSON.stringify(msg) + "\n";
    log.debug("Sending", { data: dataToSend.trim() });
    await new Promise<void>((resolve, reject) => {
      stdin.write(dataToSend, (error) => (error ? reject(error) : resolve()));
    });
  }

  onMessage(cb: (msg: unknown) => void): void {
    if (!this.proc.stdout) {
      log.error("No stdout stream available for listening");
      return;
    }

    const rl = readline.createInterface({
      input: this.proc.stdout,
      crlfDelay: Infinity,
    });

    rl.on("line", (line) => {
      if (line.trim().length === 0) {
        return;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        log.warn("Skipping non-JSON line from upstream", { line });
        return;
      }
      cb(parsed);
    });
  }

  onClose(cb: (reason?: Error) => void): void {
    this.closeListeners.push(cb);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (!this.proc.killed && this.proc.exitCode === null) {
      this.proc.kill();
    }
    this.finish();
  }

  private finish(reason?: Error): void {
    const listeners = this.closeListeners;
    this.closeListeners = [];
    this.closed = true;
    for (const listener of listeners) {
      listener(reason);
    }
  }
}
