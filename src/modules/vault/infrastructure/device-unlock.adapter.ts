import { Inject, Injectable, Logger } from '@nestjs/common';
import { constants } from 'fs';
import { access } from 'fs/promises';
import { GUARD_CONFIG } from '../../../shared/config/guard.config';
import type { GuardConfig } from '../../../shared/config/guard.config';
import type {
  UnlockError,
  UnlockPort,
  UnlockResult,
} from '../domain/unlock.port';
import { encodePinPayload, formatIoctlCommand } from '../domain/pin-payload';
import { runHelper, type HelperExit } from './helper-process';

const HELPER_TIMEOUT_MS = 5000;

// Exit statuses the helper uses, mirroring the errno of the failed ioctl
const EXIT_ENOENT = 2;
const EXIT_ENXIO = 6;
const EXIT_EACCES = 13;

function errnoOf(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Delivers the unlock ioctl to the vault's character device.
 *
 * Node cannot issue ioctl(2) itself, so the request goes through a small
 * helper executable invoked as:
 *
 *   <helper> <devicePath> <commandHex> <payloadHex>
 *
 * The helper exits 0 on success or with the errno of the failed call.
 */
@Injectable()
export class DeviceUnlockAdapter implements UnlockPort {
  private readonly logger = new Logger(DeviceUnlockAdapter.name);

  constructor(@Inject(GUARD_CONFIG) private readonly config: GuardConfig) {}

  async requestUnlock(pin: number): Promise<UnlockResult> {
    const { devicePath, ioctlCommand, helperPath } = this.config.vault;
    const payload = encodePinPayload(pin, this.config.unlock.byteOrder);

    const deviceError = await this.checkDevice(devicePath);
    if (deviceError) {
      return { success: false, error: deviceError };
    }

    this.logger.debug(
      `Issuing ioctl ${formatIoctlCommand(ioctlCommand)} on ${devicePath}`,
    );
    const exit = await runHelper(
      helperPath,
      [devicePath, formatIoctlCommand(ioctlCommand), payload.toString('hex')],
      HELPER_TIMEOUT_MS,
    );

    if (exit.status === 'exited' && exit.exitCode === 0) {
      return { success: true };
    }
    return { success: false, error: this.classifyHelperExit(exit) };
  }

  private async checkDevice(devicePath: string): Promise<UnlockError | null> {
    try {
      await access(devicePath, constants.R_OK | constants.W_OK);
      return null;
    } catch (error) {
      const errno = errnoOf(error);
      switch (errno) {
        case 'ENOENT':
        case 'ENXIO':
          return {
            code: 'DEVICE_ABSENT',
            message: `Vault device ${devicePath} not found`,
          };
        case 'EACCES':
        case 'EPERM':
          return {
            code: 'UNAUTHORIZED',
            message: `Permission denied opening ${devicePath}`,
          };
        default:
          return {
            code: 'OTHER',
            message: `Cannot open ${devicePath}: ${error instanceof Error ? error.message : String(error)}`,
          };
      }
    }
  }

  private classifyHelperExit(exit: HelperExit): UnlockError {
    const { devicePath, helperPath } = this.config.vault;

    switch (exit.status) {
      case 'timed-out':
        return {
          code: 'OTHER',
          message: `Unlock helper timed out after ${HELPER_TIMEOUT_MS}ms`,
        };
      case 'spawn-failed':
        return {
          code: 'OTHER',
          message: `Unlock helper ${helperPath} could not be started (${exit.errno})`,
        };
      case 'signaled':
        return {
          code: 'OTHER',
          message: `Unlock helper was terminated by ${exit.signal}`,
        };
      case 'exited':
        if (exit.exitCode === EXIT_EACCES) {
          return {
            code: 'UNAUTHORIZED',
            message: 'Vault refused the unlock request',
          };
        }
        if (exit.exitCode === EXIT_ENOENT || exit.exitCode === EXIT_ENXIO) {
          return {
            code: 'DEVICE_ABSENT',
            message: `Vault device ${devicePath} disappeared`,
          };
        }
        return {
          code: 'OTHER',
          message: `Unlock helper exited with status ${exit.exitCode}${exit.stderr ? `: ${exit.stderr.trim()}` : ''}`,
        };
    }
  }
}
