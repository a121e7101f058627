import { randomInt } from "node:crypto";

const ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
const PREFIX = "SWAP";
const LENGTH = 8;

export const REFERENCE_PATTERN = /^SWAP[A-Z0-9]{8}$/;

export function generateReference(): string {
  let suffix = "";
  for (let i = 0; i < LENGTH; i++) {
    suffix += ALPHABET.charAt(randomInt(ALPHABET.length));
  }
  return PREFIX + suffix;
}

export function isSwapReference(value: string): boolean {
  return REFERENCE_PATTERN.test(value);
}
