import type { JsonObject } from '../../types';

/**
 * One issue or pull request, exactly as the API returned it
 *
 * Pull requests are issues with a `pull_request` field; nothing here treats
 * them differently.
 */
export class Issue {
  constructor(readonly data: JsonObject) {}
}
