import { vi } from 'vitest';

export const API = 'https://api.github.com';

export function jsonResponse(body: unknown, status = 200, statusText = ''): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'content-type': 'application/json' },
  });
}

/**
 * Fetch double answering from a URL → response table; unknown URLs get a
 * GitHub-style 404
 */
export function routeFetch(table: Record<string, () => Response>) {
  return vi.fn(async (input: string, _init: RequestInit) => {
    const respond = table[input];
    return respond ? respond() : jsonResponse({ message: 'Not Found' }, 404, 'Not Found');
  });
}

export const orgJson = (login: string) => ({
  login,
  id: login.length,
  node_id: `O_${login}`,
  url: `${API}/orgs/${login}`,
  repos_url: `${API}/orgs/${login}/repos`,
  members_url: `${API}/orgs/${login}/members{/member}`,
  description: `${login} organization`,
});

export const repoJson = (owner: string, name: string) => ({
  id: 100,
  name,
  full_name: `${owner}/${name}`,
  private: false,
  url: `${API}/repos/${owner}/${name}`,
  issues_url: `${API}/repos/${owner}/${name}/issues{/number}`,
  has_issues: true,
  has_wiki: false,
});

export const issueJson = (number: number, title: string, login: string) => ({
  number,
  title,
  state: 'open',
  user: { login },
  updated_at: '2024-01-02T03:04:05Z',
});
