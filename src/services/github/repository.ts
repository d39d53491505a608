import type { FlagMap, JsonObject, JsonValue, Maybe, RelationMap } from '../../types';
import type { GitHubClient } from './client';
import { Cached } from './cached';
import { Issue } from './issue';
import { buildRelations, objectElements, splitFlags } from './relations';

/**
 * A single GitHub repository
 *
 * The source object is split three ways: `*_url` fields go to {@link urls}
 * (suffix removed, own `url` under `main`), `has_*` fields become boolean
 * {@link has} flags, and everything else stays in {@link fields}.
 */
export class Repository {
  readonly fields: JsonObject;
  readonly has: FlagMap;
  readonly urls: RelationMap;

  private readonly cachedDetails = new Cached<Maybe<JsonValue>>();
  private readonly cachedIssues = new Cached<Issue[]>();

  constructor(private readonly github: GitHubClient, object: JsonObject) {
    const { fields, has } = splitFlags(object);
    this.fields = fields;
    this.has = has;
    this.urls = buildRelations(object);
  }

  get name(): string {
    return typeof this.fields.name === 'string' ? this.fields.name : '';
  }

  details(): Promise<Maybe<JsonValue>> {
    return this.cachedDetails.resolve(async () => {
      const body = await this.github.get(this.urls.main);
      return { ok: body !== null, value: body };
    });
  }

  /**
   * Issues of this repository, pull requests included, memoized until
   * {@link clear}
   */
  issues(): Promise<Issue[]> {
    return this.cachedIssues.resolve(async () => {
      const body = await this.github.get(this.urls.issues);
      return {
        ok: Array.isArray(body),
        value: objectElements(body).map((object) => new Issue(object)),
      };
    });
  }

  clear(): this {
    this.cachedDetails.reset();
    this.cachedIssues.reset();
    return this;
  }
}
