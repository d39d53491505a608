import { clearStoredToken, getConfigPath, storeToken } from '../config/config';
import { logger } from '../lib/logger';

/**
 * Saves a personal access token for later runs
 *
 * @returns `false` when no token was given
 */
export function login(token: string | undefined, write: (line: string) => void): boolean {
  if (!token) {
    write('Usage: stance-github login <token>');
    return false;
  }
  storeToken(token);
  logger.info('Stored GitHub token', { path: getConfigPath() });
  write(`Token saved to ${getConfigPath()}`);
  return true;
}

export function logout(write: (line: string) => void): void {
  clearStoredToken();
  logger.info('Removed stored GitHub token', { path: getConfigPath() });
  write('Stored token removed');
}
