// CHANGE: Usage and credits text as pure data
// PURITY: CORE

import { DEFAULT_INPUT_FILE } from "../config.js";

export const HELP_TEXT = `Usage: pwned-check [options] [password ...]

Checks passwords against the Have I Been Pwned breach corpus. Only the first
5 characters of each SHA-1 digest are sent over the network.

Options:
  -i, --input <file>   Input file containing passwords to check (default "${DEFAULT_INPUT_FILE}")
  -h, --help           Show help
  -c, --credits        Show credits
      --hashed         Inputs are already SHA-1 hex digests
      --hide           Hide passwords in output
      --stats          Show statistics after completion`;

export const CREDITS_TEXT = `pwned-range-check
Breach data and the range API are provided by Have I Been Pwned (https://haveibeenpwned.com).`;
