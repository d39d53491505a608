import type { JsonObject, JsonValue, Maybe, RelationMap } from '../../types';
import type { GitHubClient } from './client';
import { Cached } from './cached';
import { buildRelations, objectElements } from './relations';
import { Repository } from './repository';

/**
 * A single GitHub organization
 *
 * Built from an element of `GET /user/orgs`. Keeps `id`, `login` and
 * `description` from the source object, plus the relation map used to reach
 * the organization's own record and its repositories.
 */
export class Organization {
  readonly id: Maybe<number>;
  readonly login: string;
  readonly description: Maybe<string>;
  readonly urls: RelationMap;

  private readonly cachedDetails = new Cached<Maybe<JsonValue>>();
  private readonly cachedRepos = new Cached<Repository[]>();

  constructor(private readonly github: GitHubClient, object: JsonObject) {
    this.id = typeof object.id === 'number' ? object.id : null;
    this.login = typeof object.login === 'string' ? object.login : '';
    this.description = typeof object.description === 'string' ? object.description : null;
    this.urls = buildRelations(object);
  }

  /**
   * Full API object for this organization, memoized until {@link clear}
   */
  details(): Promise<Maybe<JsonValue>> {
    return this.cachedDetails.resolve(async () => {
      const body = await this.github.get(this.urls.main);
      return { ok: body !== null, value: body };
    });
  }

  /**
   * Repositories belonging to this organization, memoized until
   * {@link clear}
   */
  repos(): Promise<Repository[]> {
    return this.cachedRepos.resolve(async () => {
      const body = await this.github.get(this.urls.repos);
      return {
        ok: Array.isArray(body),
        value: objectElements(body).map((object) => new Repository(this.github, object)),
      };
    });
  }

  clear(): this {
    this.cachedDetails.reset();
    this.cachedRepos.reset();
    return this;
  }
}
