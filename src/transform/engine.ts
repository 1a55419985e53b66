import { spawn } from "child_process";
import { Readable, Writable } from "stream";
import { hasErrorCode } from "../utils/fs";

export interface TransformRequest {
  metaPath: string;
  input: string;
  extraArgs?: string[];
}

export interface TransformResponse {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/** Runs one transform over `input`; resolves with whatever the engine exited with. */
export type TransformEngine = (request: TransformRequest) => Promise<TransformResponse>;

export interface EngineProcess {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  once(event: "error", listener: (error: Error) => void): unknown;
  once(event: "close", listener: (code: number | null) => void): unknown;
  kill(): boolean;
}

export type SpawnFn = (command: string, args: string[]) => EngineProcess;

export interface CanonizerEngineOptions {
  binPath: string;
  /** Kill the engine after this many ms. No limit when unset. */
  timeoutMs?: number;
  spawnFn?: SpawnFn;
}

const defaultSpawn: SpawnFn = (command, args) => spawn(command, args, { stdio: ["pipe", "pipe", "pipe"] });

export function canonizerArgs(metaPath: string, extraArgs: string[] = []): string[] {
  return ["transform", "run", "--meta", metaPath, ...extraArgs];
}

export function createCanonizerEngine(options: CanonizerEngineOptions): TransformEngine {
  const spawnFn = options.spawnFn ?? defaultSpawn;

  return (request) =>
    new Promise<TransformResponse>((resolve, reject) => {
      const child = spawnFn(options.binPath, canonizerArgs(request.metaPath, request.extraArgs));
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const settle = (action: () => void): void => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        action();
      };

      child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

      child.once("error", (error) => {
        settle(() => reject(new Error(`Failed to run canonizer ${options.binPath}: ${error.message}`)));
      });

      child.once("close", (code) => {
        settle(() =>
          resolve({
            stdout: Buffer.concat(stdout).toString("utf8"),
            stderr: Buffer.concat(stderr).toString("utf8"),
            exitCode: code ?? -1
          })
        );
      });

      if (options.timeoutMs !== undefined) {
        const timeoutMs = options.timeoutMs;
        timer = setTimeout(() => {
          settle(() => {
            child.kill();
            reject(new Error(`Canonizer timed out after ${timeoutMs}ms`));
          });
        }, timeoutMs);
      }

      // EPIPE means the engine stopped reading early; its exit code decides the outcome.
      child.stdin?.on("error", (error) => {
        if (hasErrorCode(error, "EPIPE")) return;
        settle(() => {
          child.kill();
          reject(new Error(`Failed to write canonizer input: ${error.message}`));
        });
      });
      child.stdin?.end(request.input, "utf8");
    });
}
