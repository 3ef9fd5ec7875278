/**
 * Port for the privileged unlock action.
 *
 * The guard depends on this interface; the device-specific delivery lives in
 * infrastructure adapters.
 */
export interface UnlockPort {
  /**
   * Ask the vault device to unlock with the given PIN.
   * Failures are reported in the result, not thrown.
   */
  requestUnlock(pin: number): Promise<UnlockResult>;
}

export type UnlockErrorCode = 'UNAUTHORIZED' | 'DEVICE_ABSENT' | 'OTHER';

export interface UnlockError {
  code: UnlockErrorCode;
  message: string;
}

export type UnlockResult =
  | { success: true }
  | { success: false; error: UnlockError };

export type ByteOrder = 'LE' | 'BE';

export type VaultDriver = 'device' | 'dry-run';

export interface VaultSettings {
  driver: VaultDriver;
  /** Character device node of the vault */
  devicePath: string;
  /** ioctl request number; 0x40047601 is _IOW('v', 1, int) */
  ioctlCommand: number;
  /** Executable that performs the ioctl on our behalf */
  helperPath: string;
}

export const UNLOCK_PORT = Symbol('UNLOCK_PORT');
