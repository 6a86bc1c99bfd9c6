// CHANGE: Temporary candidate files for file-mode tests
// INVARIANT: cleanup() removes the whole temporary directory

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

export interface TempInput {
	readonly path: string;
	readonly cleanup: () => void;
}

/**
 * Write `contents` to a fresh file in its own temporary directory.
 */
export function createTempInput(contents: string | Uint8Array): TempInput {
	const dir = fs.mkdtempSync(path.join(os.tmpdir(), "pwned-check-"));
	const file = path.join(dir, "passwords.txt");
	fs.writeFileSync(file, contents);
	return {
		path: file,
		cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
	};
}
