import * as fs from 'fs/promises';
import * as path from 'path';
import type { Writable } from 'stream';
import { ArtifactCreationError, ArtifactWriteError } from './errors.js';

export function attemptArtifactName(commandId: number, sequence: number): string {
  return `cmd_${commandId}-attempt${sequence}.log`;
}

export function finalArtifactName(commandId: number): string {
  return `cmd_${commandId}-final.log`;
}

export interface AttemptHandle {
  path: string;
  sink: Writable;
  // Flushes and closes the artifact; must be awaited before promotion.
  // Rejects with ArtifactWriteError if any write to the sink failed.
  close(): Promise<void>;
}

export type PromotionResult =
  | { promoted: true; finalPath: string }
  | { promoted: false; finalPath: string; error: Error };

export class AttemptRecorder {
  constructor(readonly outputDir: string) {}

  async ensureOutputDir(): Promise<void> {
    try {
      await fs.mkdir(this.outputDir, { recursive: true });
    } catch (err) {
      throw new ArtifactCreationError(this.outputDir, err);
    }
  }

  async beginAttempt(commandId: number, sequence: number): Promise<AttemptHandle> {
    const attemptPath = path.join(this.outputDir, attemptArtifactName(commandId, sequence));

    let file: fs.FileHandle;
    try {
      file = await fs.open(attemptPath, 'w');
    } catch (err) {
      throw new ArtifactCreationError(attemptPath, err);
    }

    const sink = file.createWriteStream();

    // A write can fail while a transport is still piping, before close() runs
    let writeError: Error | null = null;
    sink.on('error', (err) => {
      writeError ??= err;
    });
    const released = new Promise<void>(resolve => {
      sink.once('close', () => resolve());
    });

    let closed: Promise<void> | null = null;

    return {
      path: attemptPath,
      sink,
      close: () => {
        closed ??= (async () => {
          if (!sink.destroyed) {
            sink.end();
          }
          await released;
          if (writeError) {
            throw new ArtifactWriteError(attemptPath, writeError);
          }
        })();
        return closed;
      },
    };
  }

  /**
   * Atomically renames the attempt artifact to the command's final name.
   * A failed rename leaves the record where it was and is reported, not thrown.
   */
  async promote(commandId: number, attemptPath: string): Promise<PromotionResult> {
    const finalPath = path.join(this.outputDir, finalArtifactName(commandId));
    try {
      await fs.rename(attemptPath, finalPath);
      return { promoted: true, finalPath };
    } catch (err) {
      return {
        promoted: false,
        finalPath: attemptPath,
        error: err instanceof Error ? err : new Error(String(err)),
      };
    }
  }
}
