// CHANGE: Compile-time defaults for the range client and the CLI
// PURITY: CORE
// INVARIANT: Constants only; no environment access

/** Base URL of the Pwned Passwords range API (without the `/range` segment). */
export const RANGE_API_BASE_URL = "https://api.pwnedpasswords.com";

/** Ceiling for one range request, in milliseconds. */
export const LOOKUP_TIMEOUT_MS = 10_000;

/** Input file read when no password is passed on the command line. */
export const DEFAULT_INPUT_FILE = "passwords.txt";

/** `User-Agent` header sent with every range request. */
export const USER_AGENT = "pwned-range-check";

/** Request `Add-Padding` so that response size does not reveal the prefix bucket. */
export const ADD_PADDING = true;

/** Length of the transmitted digest prefix. */
export const PREFIX_LENGTH = 5;

/** Length of a hex-encoded SHA-1 digest. */
export const DIGEST_HEX_LENGTH = 40;
