import crypto from 'crypto';
import { RngError } from '../errors';

// crypto.randomInt rejects ranges wider than 2^48 - 1
const MAX_BOUND = 2 ** 48 - 1;

export interface SecureRandomSource {
  /** Uniform integer in [0, bound). Throws RngError. */
  randomIndex(bound: number): number;
}

export const cryptoRandomSource: SecureRandomSource = {
  randomIndex(bound: number): number {
    if (!Number.isSafeInteger(bound) || bound <= 0 || bound > MAX_BOUND) {
      throw new RngError(`random bound must be a positive integer no greater than ${MAX_BOUND}, got ${bound}`);
    }
    try {
      // randomInt draws by rejection sampling, so there is no modulo bias
      return crypto.randomInt(bound);
    } catch (err) {
      throw new RngError('failed to generate random index', err);
    }
  }
};
