import { throwDecoder } from '../../types';
import { KeyCode, NecCode } from './types';

// NEC timings in microseconds
// https://www.sbprojects.net/knowledge/ir/nec.php
const necLeaderPulse = 9000;
const necLeaderSpace = 4500;
const necBitPulse = 562;
const necZeroSpace = 562;
const necOneSpace = 1687;

// Pronto clock period in microseconds
const prontoUnit = 0.241246;

export const encodeNec = ({ address, command }: NecCode): number[] => {
  for (const [name, value] of [['address', address], ['command', command]] as const) {
    if (!Number.isInteger(value) || value < 0 || value > 0xff)
      throw new Error(`NEC ${name} must be a byte, got ${value}`);
  }

  const bytes = [address, ~address & 0xff, command, ~command & 0xff];
  const pulses = [necLeaderPulse, necLeaderSpace];

  for (const byte of bytes) {
    // least significant bit first
    for (let bit = 0; bit < 8; bit++) {
      pulses.push(necBitPulse, (byte >> bit) & 1 ? necOneSpace : necZeroSpace);
    }
  }

  pulses.push(necBitPulse);
  return pulses;
};

/**
 * Decodes a learned Pronto code (type 0000). Uses the once sequence, or the
 * repeat sequence when there is no once sequence.
 */
export const decodePronto = (code: string): number[] => {
  const words = code.trim().split(/\s+/).map(word => {
    if (!/^[0-9a-fA-F]{4}$/.test(word)) throw new Error(`Invalid Pronto word: ${word}`);
    return parseInt(word, 16);
  });

  const [type, frequency, onceLength, repeatLength] = words;
  if (type !== 0 || frequency === undefined || onceLength === undefined || repeatLength === undefined)
    throw new Error('Only learned Pronto codes (0000) are supported');
  if (frequency === 0) throw new Error('Pronto frequency word must not be 0');
  if (words.length !== 4 + 2 * (onceLength + repeatLength))
    throw new Error(`Pronto code should have ${4 + 2 * (onceLength + repeatLength)} words, got ${words.length}`);

  const pairs = onceLength > 0 ? onceLength : repeatLength;
  if (pairs === 0) throw new Error('Pronto code has no burst pairs');

  const burst = words.slice(4, 4 + 2 * pairs);

  const pulses = burst.map(cycles => Math.round(cycles * frequency * prontoUnit));

  // sequences end with a space, the transmitter takes trains ending in a pulse
  return pulses.slice(0, -1);
};

export const validateRaw = (pulses: number[]): number[] => {
  if (pulses.length === 0 || pulses.length % 2 === 0)
    throw new Error(`Raw code needs an odd number of durations, got ${pulses.length}`);
  if (pulses.some(d => !Number.isInteger(d) || d <= 0))
    throw new Error('Raw code durations must be positive integers');
  return pulses;
};

/**
 * Turns the code data of a key into the pulse train to transmit.
 */
export const toPulses = (data: unknown): number[] => {
  const code = throwDecoder(KeyCode)(data, 'Unsupported IR code data');

  if (Array.isArray(code)) return validateRaw(code);
  if (typeof code === 'string') return decodePronto(code);
  return encodeNec(code);
};
