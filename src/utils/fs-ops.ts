/**
 * Filesystem primitives used by the executors, injectable for tests
 */
import * as fs from 'fs-extra';
import * as path from 'path';

export interface FileSystemOps {
	/** True if anything (including a dangling symlink) exists at the path */
	exists(target: string): Promise<boolean>;
	/** Recursive size in bytes, or null if the path is gone or unreadable */
	sizeOf(target: string): Promise<number | null>;
	/** Names of the entries directly inside a directory */
	list(dir: string): Promise<string[]>;
	/** Recursive delete; rejects on failure */
	remove(target: string): Promise<void>;
}

export async function pathPresent(target: string): Promise<boolean> {
	try {
		await fs.lstat(target);
		return true;
	} catch {
		return false;
	}
}

/**
 * Sum of file sizes under a path. Symlinks count as themselves and are not followed.
 * Entries that vanish or cannot be read mid-walk are skipped.
 */
export async function calculateSize(target: string): Promise<number | null> {
	let root: fs.Stats;
	try {
		root = await fs.lstat(target);
	} catch {
		return null;
	}
	if (!root.isDirectory()) return root.size;

	let size = 0;
	const walk = async (dir: string): Promise<void> => {
		let entries: string[];
		try {
			entries = await fs.readdir(dir);
		} catch {
			return;
		}
		for (const entry of entries) {
			const entryPath = path.join(dir, entry);
			try {
				const stat = await fs.lstat(entryPath);
				if (stat.isDirectory()) {
					await walk(entryPath);
				} else {
					size += stat.size;
				}
			} catch {
				// vanished between readdir and lstat
			}
		}
	};
	await walk(target);
	return size;
}

export const nodeFileSystem: FileSystemOps = {
	exists: pathPresent,
	sizeOf: calculateSize,
	list: (dir) => fs.readdir(dir),
	remove: (target) => fs.remove(target),
};
