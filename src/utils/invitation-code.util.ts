import { randomInt } from 'crypto';

// Uppercase letters and digits without the look-alikes O, 0, I and 1
export const INVITATION_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';

const GROUPS = 4;
const GROUP_LENGTH = 3;

export const INVITATION_CODE_PATTERN = /^[A-HJ-NP-Z2-9]{3}(-[A-HJ-NP-Z2-9]{3}){3}$/;

/** Readable single-use code in `ABC-DEF-GHJ-KLM` form. */
export function generateInvitationCode(): string {
  const groups: string[] = [];
  for (let g = 0; g < GROUPS; g++) {
    let group = '';
    for (let i = 0; i < GROUP_LENGTH; i++) {
      group += INVITATION_ALPHABET[randomInt(INVITATION_ALPHABET.length)];
    }
    groups.push(group);
  }
  return groups.join('-');
}

export function normalizeInvitationCode(code: string): string {
  return code.trim().toUpperCase();
}
