import chalk, { type ChalkInstance } from 'chalk';
import type { GitHubClient } from '../services/github';
import { formatIssueLine } from '../lib/utils';

export interface ListOptions {
  write: (line: string) => void;
  style?: ChalkInstance;
}

/**
 * Walks every organization, repository and issue visible to the client and
 * writes one line per issue under an `org / repo:` heading
 *
 * @returns `false` when the organization list could not be fetched; the
 * reason is left in `client.lastError()`
 */
export async function listAll(client: GitHubClient, options: ListOptions): Promise<boolean> {
  const { write, style = chalk } = options;

  // every failure stores a freshly decoded error, so a change means this call failed
  const before = client.lastError();
  const orgs = await client.orgs();
  if (orgs.length === 0 && client.lastError() !== before) {
    return false;
  }

  for (const org of orgs) {
    for (const repo of await org.repos()) {
      write(style.bold(`${org.login} / ${repo.name}:`));
      for (const issue of await repo.issues()) {
        write(formatIssueLine(issue));
      }
      write('');
    }
  }
  return true;
}
