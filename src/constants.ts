/** Loopia XML-RPC endpoint */
export const LOOPIA_API_URL = 'https://api.loopia.se/RPCSERV';

/** Request timeout in milliseconds for a single RPC round trip */
export const DEFAULT_HTTP_TIMEOUT = 10_000;

/** Lowest TTL Loopia accepts for zone records */
export const MIN_TTL = 300;

/** TTL used for challenge records when none is configured */
export const DEFAULT_TTL = MIN_TTL;

/** Label prepended to a domain to form its DNS-01 challenge name */
export const ACME_CHALLENGE_LABEL = '_acme-challenge';

/** Status string returned by Loopia on success */
export const STATUS_OK = 'OK';

/** Status string returned by Loopia when the credentials are rejected */
export const STATUS_AUTH_ERROR = 'AUTH_ERROR';
