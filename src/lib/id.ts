import { customAlphabet } from 'nanoid';

const alphabet = 'abcdefghijklmnopqrstuvwxyz0123456789';

const longId = customAlphabet(alphabet, 8);

export function requestId(): string {
  return `rq-${longId()}`;
}
