/**
 * Per-run workspace directory: `<root>/<sessionId>/workspace/`.
 * Mirrors every artifact to disk as the run produces it and serves as the
 * agents' working directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  ErrorCode,
  SystemError,
  getErrorMessage,
} from '../../core/errors/index.js';

export class Workspace {
  private constructor(readonly dir: string) {}

  static create(root: string, sessionId: string): Workspace {
    const dir = path.resolve(root, sessionId, 'workspace');
    try {
      fs.mkdirSync(path.join(dir, 'code'), { recursive: true });
      fs.mkdirSync(path.join(dir, 'reviews'), { recursive: true });
    } catch (error: unknown) {
      throw new SystemError(
        `Cannot create workspace at ${dir}`,
        ErrorCode.PERMISSION_DENIED,
        { dir },
        error instanceof Error ? error : undefined
      );
    }
    return new Workspace(dir);
  }

  initialCodePath(): string {
    return path.join(this.dir, 'code', 'initial.txt');
  }

  reviewPath(cycle: number): string {
    return path.join(this.dir, 'reviews', `review_${cycle}.md`);
  }

  critiquePath(cycle: number): string {
    return path.join(this.dir, 'reviews', `critique_${cycle}.md`);
  }

  revisionPath(cycle: number): string {
    return path.join(this.dir, 'code', `revision_${cycle}.txt`);
  }

  /** Output of the test command run after code version `cycle` */
  testLogPath(cycle: number): string {
    return path.join(this.dir, 'tests', `run_${cycle}.log`);
  }

  writeInitialCode(code: string): void {
    this.write(this.initialCodePath(), code);
  }

  writeReview(cycle: number, text: string): void {
    this.write(this.reviewPath(cycle), text);
  }

  writeCritique(cycle: number, text: string): void {
    this.write(this.critiquePath(cycle), text);
  }

  writeRevision(cycle: number, code: string): void {
    this.write(this.revisionPath(cycle), code);
  }

  writeTestLog(cycle: number, text: string): void {
    this.write(this.testLogPath(cycle), text);
  }

  /**
   * Workspace files relative to its root with `/` separators, sorted.
   * Includes anything the agents created there.
   */
  manifest(): string[] {
    const files: string[] = [];
    const walk = (dir: string): void => {
      for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          walk(full);
        } else {
          files.push(path.relative(this.dir, full).split(path.sep).join('/'));
        }
      }
    };
    walk(this.dir);
    return files.sort();
  }

  private write(file: string, text: string): void {
    try {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, text, 'utf8');
    } catch (error: unknown) {
      throw new SystemError(
        `Cannot write workspace file ${file}: ${getErrorMessage(error)}`,
        ErrorCode.WRITE_FAILED,
        { file },
        error instanceof Error ? error : undefined
      );
    }
  }
}
