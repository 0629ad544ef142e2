/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * helpers.ts: Shared test fixtures for Reelcast.
 */
import type { MediaItem, RecoveryConfig, RunTarget } from "../src/types/index.js";
import type { TranscoderEngine, TranscoderExit, TranscoderProcess } from "../src/utils/index.js";
import { PassThrough } from "node:stream";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const { promises: fsPromises } = fs;

/**
 * Creates a temporary directory for a test.
 * @returns The absolute path of the new directory.
 */
export async function makeTempDir(): Promise<string> {

  return fsPromises.mkdtemp(path.join(os.tmpdir(), "reelcast-test-"));
}

/**
 * Removes a temporary directory created by makeTempDir().
 * @param dir - The directory.
 */
export async function removeTempDir(dir: string): Promise<void> {

  await fsPromises.rm(dir, { force: true, recursive: true });
}

/**
 * Creates a media item under /media.
 * @param name - File name.
 * @returns The item.
 */
export function makeItem(name: string): MediaItem {

  return { durationSeconds: 120, path: "/media/" + name, sizeBytes: 2097152 };
}

/**
 * Recovery settings small enough for tests.
 */
export const TEST_RECOVERY: RecoveryConfig = {

  backoffJitter: 0,
  criticalErrorThreshold: 1,
  livenessWindow: 1000,
  maxBackoffDelay: 20,
  maxHangRestarts: 3,
  maxSpawnAttempts: 2,
  restartDelay: 5,
  stopGracePeriod: 50
};

/**
 * A transcoder process driven by the test. Diagnostic lines are written with emit(), the exit with exit(). Signals are recorded and, unless ignoreTerm is set,
 * end the process.
 */
export class FakeTranscoder implements TranscoderProcess {

  public readonly diagnostics: PassThrough;
  public endedAt: number | null;
  public readonly exited: Promise<TranscoderExit>;
  public readonly pid: number;
  public readonly signals: NodeJS.Signals[];
  public readonly startedAt: number;
  public readonly target: RunTarget;
  public ignoreTerm: boolean;
  private resolveExit: (exit: TranscoderExit) => void;
  private running: boolean;

  constructor(target: RunTarget, pid: number) {

    this.diagnostics = new PassThrough();
    this.endedAt = null;
    this.ignoreTerm = false;
    this.pid = pid;
    this.resolveExit = (): void => undefined;
    this.running = true;
    this.signals = [];
    this.startedAt = Date.now();
    this.target = target;

    this.exited = new Promise<TranscoderExit>((resolve) => {

      this.resolveExit = resolve;
    });
  }

  public emit(line: string): void {

    this.diagnostics.write(line + "\n");
  }

  public exit(code: number | null, signal: NodeJS.Signals | null = null): void {

    if(!this.running) {

      return;
    }

    this.running = false;
    this.endedAt = Date.now();
    this.diagnostics.end();
    this.resolveExit({ code, signal });
  }

  public kill(): void {

    this.signals.push("SIGKILL");
    this.exit(null, "SIGKILL");
  }

  public terminate(): void {

    this.signals.push("SIGTERM");

    if(!this.ignoreTerm) {

      this.exit(null, "SIGTERM");
    }
  }
}

/**
 * A transcoder engine that hands out FakeTranscoder instances and lets the test wait for each start.
 */
export class FakeEngine implements TranscoderEngine {

  public failuresBeforeStart: number;
  public readonly processes: FakeTranscoder[];
  private waiters: ((process: FakeTranscoder) => void)[];

  constructor() {

    this.failuresBeforeStart = 0;
    this.processes = [];
    this.waiters = [];
  }

  public async start(target: RunTarget): Promise<TranscoderProcess> {

    if(this.failuresBeforeStart > 0) {

      this.failuresBeforeStart--;

      throw new Error("spawn test-ffmpeg ENOENT");
    }

    const transcoder = new FakeTranscoder(target, 1000 + this.processes.length);

    this.processes.push(transcoder);

    const waiters = this.waiters;

    this.waiters = [];

    for(const waiter of waiters) {

      waiter(transcoder);
    }

    return Promise.resolve(transcoder);
  }

  /**
   * Resolves with the process number `index` (0-based) once it has been started and is being supervised.
   * @param index - Which start to wait for.
   * @returns The process.
   */
  public async nextProcess(index: number): Promise<FakeTranscoder> {

    const existing = this.processes.at(index);

    if(existing) {

      return existing;
    }

    return new Promise<FakeTranscoder>((resolve) => {

      const check = (process: FakeTranscoder): void => {

        // Resolve on the next turn of the event loop, once the supervisor has finished setting up the run.
        if(this.processes.indexOf(process) === index) {

          setImmediate(() => resolve(process));

          return;
        }

        this.waiters.push(check);
      };

      this.waiters.push(check);
    });
  }
}
