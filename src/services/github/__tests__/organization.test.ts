import { describe, it, expect, vi } from 'vitest';
import { GitHubClient } from '../client';
import { Organization } from '../organization';
import { Repository } from '../repository';
import { API, jsonResponse, orgJson, repoJson, routeFetch } from './helpers';

vi.mock('../../../lib/logger', () => ({
  logger: {
    debug: vi.fn(),
    error: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
  },
}));

function setup(table: Record<string, () => Response> = {}) {
  const fetchMock = routeFetch(table);
  const client = new GitHubClient(API, { fetch: fetchMock });
  const org = new Organization(client, orgJson('acme'));
  return { fetchMock, client, org };
}

describe('Organization', () => {
  it('should keep id, login and description', () => {
    const { org } = setup();

    expect(org.id).toBe(4);
    expect(org.login).toBe('acme');
    expect(org.description).toBe('acme organization');
  });

  it('should build relation URLs from the *_url fields', () => {
    const { org } = setup();

    expect(org.urls).toEqual({
      main: `${API}/orgs/acme`,
      repos: `${API}/orgs/acme/repos`,
      members: `${API}/orgs/acme/members{/member}`,
    });
  });

  it('should default missing scalar fields', () => {
    const { client } = setup();
    const org = new Organization(client, { login: 'bare', description: null });

    expect(org.id).toBeNull();
    expect(org.description).toBeNull();
    expect(org.urls).toEqual({});
  });

  describe('details', () => {
    it('should fetch the canonical URL once', async () => {
      const { org, fetchMock } = setup({
        [`${API}/orgs/acme`]: () => jsonResponse({ login: 'acme', public_repos: 3 }),
      });

      await expect(org.details()).resolves.toEqual({ login: 'acme', public_repos: 3 });
      await org.details();

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock.mock.calls[0][0]).toBe(`${API}/orgs/acme`);
    });

    it('should retry after a failure', async () => {
      const { org, fetchMock, client } = setup();

      await expect(org.details()).resolves.toBeNull();
      await expect(org.details()).resolves.toBeNull();

      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(client.lastError()).toEqual({ message: 'Not Found' });
    });
  });

  describe('repos', () => {
    const reposRoute = () => jsonResponse([repoJson('acme', 'widgets'), repoJson('acme', 'gadgets')]);

    it('should wrap each repository in order', async () => {
      const { org } = setup({ [`${API}/orgs/acme/repos`]: reposRoute });

      const repos = await org.repos();

      expect(repos[0]).toBeInstanceOf(Repository);
      expect(repos.map((repo) => repo.name)).toEqual(['widgets', 'gadgets']);
    });

    it('should memoize until cleared', async () => {
      const { org, fetchMock } = setup({
        [`${API}/orgs/acme`]: () => jsonResponse({ login: 'acme' }),
        [`${API}/orgs/acme/repos`]: reposRoute,
      });

      await org.repos();
      await org.details();
      await org.repos();
      await org.details();
      expect(fetchMock).toHaveBeenCalledTimes(2);

      expect(org.clear()).toBe(org);
      await org.repos();
      await org.details();
      expect(fetchMock).toHaveBeenCalledTimes(4);
    });

    it('should resolve to an empty list when the fetch fails', async () => {
      const { org } = setup();

      await expect(org.repos()).resolves.toEqual([]);
    });
  });
});
