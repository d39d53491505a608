import { describe, it, expect, vi, afterEach } from 'vitest';
import { clearStoredToken, storeToken } from '../../config/config';
import { login, logout } from '../auth';

vi.mock('../../config/config', () => ({
  storeToken: vi.fn(),
  clearStoredToken: vi.fn(),
  getConfigPath: vi.fn(() => '/mock/config/path/config.json'),
}));
vi.mock('../../lib/logger', () => ({
  logger: {
    debug: vi.fn(),
    error: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
  },
}));

describe('login', () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it('should store the given token', () => {
    const write = vi.fn();

    expect(login('test-token', write)).toBe(true);
    expect(storeToken).toHaveBeenCalledWith('test-token');
    expect(write).toHaveBeenCalledWith('Token saved to /mock/config/path/config.json');
  });

  it('should print usage without a token', () => {
    const write = vi.fn();

    expect(login(undefined, write)).toBe(false);
    expect(storeToken).not.toHaveBeenCalled();
    expect(write).toHaveBeenCalledWith('Usage: stance-github login <token>');
  });
});

describe('logout', () => {
  it('should clear the stored token', () => {
    const write = vi.fn();

    logout(write);

    expect(clearStoredToken).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith('Stored token removed');
  });
});
