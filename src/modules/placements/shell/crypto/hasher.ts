/**
 * SHA-256 hasher backed by Node.js crypto.
 */

import { createHash } from 'node:crypto';

import type { Hasher } from '../../core/ports.js';

export const cryptoHasher: Hasher = {
  sha256(data: string): string {
    return createHash('sha256').update(data).digest('hex');
  },
};
