import { InvalidLengthError, NoCharacterClassSelectedError, RngError } from '../errors';
import type { CharacterClass, PasswordConfig } from '../types/password';
import { cryptoRandomSource, type SecureRandomSource } from './secure-random';

export const MIN_PASSWORD_LENGTH = 6;

export const LOWERCASE_CHARS = 'abcdefghijklmnopqrstuvwxyz';
export const UPPERCASE_CHARS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
export const NUMBER_CHARS = '0123456789';
export const SPECIAL_CHARS = '!@#$%^&*()_+-=[]{}|;:,.<>?';

// Canonical order: alphabet composition and guaranteed inclusion both follow it.
export const CHARACTER_CLASSES: readonly CharacterClass[] = Object.freeze([
  { name: 'lowercase', option: 'useLowercase', chars: LOWERCASE_CHARS },
  { name: 'uppercase', option: 'useUppercase', chars: UPPERCASE_CHARS },
  { name: 'numbers', option: 'useNumbers', chars: NUMBER_CHARS },
  { name: 'special', option: 'useSpecial', chars: SPECIAL_CHARS }
] as const);

export function enabledClasses(config: Readonly<PasswordConfig>): CharacterClass[] {
  return CHARACTER_CLASSES.filter(c => config[c.option]);
}

export function composeAlphabet(config: Readonly<PasswordConfig>): string {
  return enabledClasses(config).map(c => c.chars).join('');
}

export function validatePasswordConfig(config: Readonly<PasswordConfig>): void {
  if (!Number.isInteger(config.length) || config.length < MIN_PASSWORD_LENGTH) {
    throw new InvalidLengthError(MIN_PASSWORD_LENGTH);
  }
  if (enabledClasses(config).length === 0) {
    throw new NoCharacterClassSelectedError();
  }
}

function draw(random: SecureRandomSource, bound: number, failure: string): number {
  let index: number;
  try {
    index = random.randomIndex(bound);
  } catch (err) {
    if (err instanceof RngError) throw err;
    throw new RngError(failure, err);
  }
  if (!Number.isInteger(index) || index < 0 || index >= bound) {
    throw new RngError(`${failure}: index ${index} outside [0, ${bound})`);
  }
  return index;
}

/**
 * Builds a password with at least one character from every enabled class,
 * then shuffles it (Fisher-Yates) so positions carry no class information.
 */
export function generatePassword(
  config: Readonly<PasswordConfig>,
  random: SecureRandomSource = cryptoRandomSource
): string {
  validatePasswordConfig(config);

  const classes = enabledClasses(config);
  const alphabet = composeAlphabet(config);
  const chars: string[] = [];

  for (const c of classes) {
    chars.push(c.chars[draw(random, c.chars.length, 'failed to generate random index')]);
  }

  const remaining = config.length - chars.length;
  for (let i = 0; i < remaining; i++) {
    chars.push(alphabet[draw(random, alphabet.length, 'failed to generate random index')]);
  }

  for (let i = chars.length - 1; i > 0; i--) {
    const j = draw(random, i + 1, 'failed to shuffle password');
    [chars[i], chars[j]] = [chars[j], chars[i]];
  }

  return chars.join('');
}
