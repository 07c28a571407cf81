import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

export function tempPathFor(filePath: string): string {
	return `${filePath}.tmp`;
}

/**
 * Writes the full content next to the target, then swaps it in with a rename.
 * Readers see either the previous file or the new one, never a partial write.
 */
export async function writeFileAtomic(
	filePath: string,
	content: string,
): Promise<void> {
	await mkdir(path.dirname(filePath), { recursive: true });

	const tempPath = tempPathFor(filePath);
	await writeFile(tempPath, content, "utf8");
	await rename(tempPath, filePath);
}

/** Drops a temp file left behind by a write that never reached the rename. */
export async function discardStaleTemp(filePath: string): Promise<boolean> {
	const tempPath = tempPathFor(filePath);
	try {
		await rm(tempPath);
		return true;
	} catch (error) {
		if (isMissingFileError(error)) return false;
		throw error;
	}
}

export function isMissingFileError(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"code" in error &&
		error.code === "ENOENT"
	);
}
