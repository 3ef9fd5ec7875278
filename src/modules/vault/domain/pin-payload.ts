import { PinOutOfRangeError } from '../../../shared/domain/errors';
import type { ByteOrder } from './unlock.port';

export const PIN_PAYLOAD_BYTES = 4;

export function isValidPin(pin: number): boolean {
  return Number.isInteger(pin) && pin >= 0 && pin <= 0xffffffff;
}

/**
 * 4-byte unsigned PIN in the byte order the device reads. The reference
 * device copies a native `int`, which is little-endian on x86 and ARM.
 * @throws PinOutOfRangeError if the PIN does not fit in 32 unsigned bits
 */
export function encodePinPayload(pin: number, byteOrder: ByteOrder): Buffer {
  if (!isValidPin(pin)) {
    throw new PinOutOfRangeError(pin);
  }
  const payload = Buffer.alloc(PIN_PAYLOAD_BYTES);
  if (byteOrder === 'LE') {
    payload.writeUInt32LE(pin);
  } else {
    payload.writeUInt32BE(pin);
  }
  return payload;
}

export function formatIoctlCommand(command: number): string {
  return `0x${command.toString(16).padStart(8, '0')}`;
}
