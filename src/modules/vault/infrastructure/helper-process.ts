import { execFile } from 'child_process';

export type HelperExit =
  | { status: 'exited'; exitCode: number; stderr: string }
  | { status: 'signaled'; signal: string; stderr: string }
  | { status: 'spawn-failed'; errno: string }
  | { status: 'timed-out' };

/**
 * Run the ioctl helper and report how it ended. Never rejects.
 */
export function runHelper(
  file: string,
  args: string[],
  timeoutMs: number,
): Promise<HelperExit> {
  return new Promise((resolve) => {
    execFile(file, args, { timeout: timeoutMs }, (error, _stdout, stderr) => {
      if (!error) {
        resolve({ status: 'exited', exitCode: 0, stderr: String(stderr) });
        return;
      }
      if (error.killed) {
        resolve({ status: 'timed-out' });
        return;
      }
      if (typeof error.code === 'number') {
        resolve({
          status: 'exited',
          exitCode: error.code,
          stderr: String(stderr),
        });
        return;
      }
      // Started, but ended by a signal it did not get from us
      if (error.signal) {
        resolve({
          status: 'signaled',
          signal: error.signal,
          stderr: String(stderr),
        });
        return;
      }
      resolve({
        status: 'spawn-failed',
        errno: typeof error.code === 'string' ? error.code : 'UNKNOWN',
      });
    });
  });
}
