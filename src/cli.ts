import chalk from 'chalk';
import { GitHubClient } from './services/github';
import { readConfig, resolveToken, isDebugFromEnv } from './config/config';
import { listAll } from './commands/list';
import { login, logout } from './commands/auth';
import { logger } from './lib/logger';

async function main(): Promise<number> {
  const [command, arg] = process.argv.slice(2);
  const print = (line: string) => {
    process.stdout.write(`${line}\n`);
  };

  if (command === 'login') {
    return login(arg, print) ? 0 : 1;
  }
  if (command === 'logout') {
    logout(print);
    return 0;
  }

  const token = resolveToken();
  if (!token) {
    process.stderr.write(chalk.red('No GitHub token found. Set GITHUB_TOKEN or GH_TOKEN, or run "login <token>".\n'));
    return 1;
  }

  const client = new GitHubClient(readConfig().apiBase, { debug: isDebugFromEnv() })
    .authenticate('token', token);

  const ok = await listAll(client, {
    write: print,
  });
  if (!ok) {
    process.stderr.write(chalk.red(`Failed to list organizations: ${JSON.stringify(client.lastError())}\n`));
    return 1;
  }
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error('Listing failed', { error });
    process.stderr.write(chalk.red(`${error instanceof Error ? error.message : String(error)}\n`));
    process.exitCode = 1;
  }
);
