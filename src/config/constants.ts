/**
 * API endpoint and client identity
 */
export const DEFAULT_API_BASE = 'https://api.github.com';
export const CLIENT_VERSION = '1.0.0';
export const USER_AGENT = `stance-github/${CLIENT_VERSION}`;

// Entry point for organization discovery; everything else is hypermedia
export const USER_ORGS_PATH = '/user/orgs';

// Environment
export const DEBUG_ENV_VAR = 'STANCE_GITHUB_DEBUG';
export const LOG_LEVEL_ENV_VAR = 'STANCE_GITHUB_LOG_LEVEL';
export const DEFAULT_LOG_LEVEL = 'warn';

// Debug tracing
export const REDACTED_TOKEN = '[REDACTED]';
export const TRACE_REQUEST_RULE = '========================';
export const TRACE_RESPONSE_RULE = '-----------------------------------------';

// Issue listing columns
export const ISSUE_NUMBER_WIDTH = 5;
export const ISSUE_TITLE_WIDTH = 30;
export const ISSUE_LOGIN_WIDTH = 10;
