export const DEFAULT_NOMAD_ADDR = 'http://127.0.0.1:4646';
/** `*` lists objects across every namespace the token can read */
export const DEFAULT_NAMESPACE = '*';
export const DEFAULT_PAGE_SIZE = 100;
/** Nomad rejects per_page values above this */
export const MAX_PAGE_SIZE = 1000;
/** Floor for incremental streams on first run (ModifyIndex starts at 1) */
export const DEFAULT_START_INDEX = 0;

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_RETRIES = 5;
export const DEFAULT_RETRY_BASE_DELAY_MS = 1000;
export const DEFAULT_RETRY_MAX_DELAY_MS = 20_000;
export const DEFAULT_RETRY_JITTER_MS = 300;

export const NOMAD_TOKEN_HEADER = 'X-Nomad-Token';
export const NOMAD_NEXT_TOKEN_HEADER = 'X-Nomad-NextToken';
export const NOMAD_INDEX_HEADER = 'X-Nomad-Index';

export const TAP_NAME = 'tap-nomad';
