import { PasswordGenerationError } from '../errors';
import { logger } from '../logger';
import { enabledClasses, generatePassword } from '../services/password';
import { cryptoRandomSource, type SecureRandomSource } from '../services/secure-random';
import type { PasswordConfig } from '../types/password';
import { InputClosedError, readLength, readYesNo, type LineReader, type SessionOutput } from './prompt';

const BANNER = 'Welcome to secure-passgen - Your Secure Password Generator';
const DELIMITER = '------------------------';

async function readConfig(reader: LineReader, out: SessionOutput): Promise<PasswordConfig> {
  const length = await readLength(reader, out);
  return {
    length,
    useLowercase: await readYesNo(reader, out, 'Include lowercase letters? (y/n): '),
    useUppercase: await readYesNo(reader, out, 'Include uppercase letters? (y/n): '),
    useNumbers: await readYesNo(reader, out, 'Include numbers? (y/n): '),
    useSpecial: await readYesNo(reader, out, 'Include special characters? (y/n): ')
  };
}

/** Runs one interactive generation and resolves with the process exit status. */
export async function runSession(
  reader: LineReader,
  out: SessionOutput = console,
  random: SecureRandomSource = cryptoRandomSource
): Promise<number> {
  out.log(BANNER);
  out.log('-'.repeat(BANNER.length));

  let passwordConfig: PasswordConfig;
  try {
    passwordConfig = await readConfig(reader, out);
  } catch (err) {
    if (err instanceof InputClosedError) {
      out.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  let password: string;
  try {
    password = generatePassword(passwordConfig, random);
  } catch (err) {
    if (err instanceof PasswordGenerationError) {
      logger.debug({ code: err.code, length: passwordConfig.length }, 'password generation failed');
      out.error(`Error generating password: ${err.message}`);
      return 1;
    }
    throw err;
  }
  logger.debug(
    { length: password.length, classes: enabledClasses(passwordConfig).map(c => c.name) },
    'password generated'
  );

  out.log('');
  out.log('Your generated password is:');
  out.log(DELIMITER);
  out.log(password);
  out.log(DELIMITER);
  return 0;
}
