export {
  GitHubClient,
  Organization,
  Repository,
  Issue,
  type ClientOptions,
} from './services/github';

export type {
  FlagMap,
  JsonObject,
  JsonValue,
  Maybe,
  RelationMap,
  TraceSink,
  Transport,
} from './types';
