/**
 * Per-path measure-and-delete used by the SDK executor and the cache cleaners
 */
import * as path from 'path';
import { ExecutionOutcome } from '../types';
import { describeError } from '../utils/errors';
import { FileSystemOps } from '../utils/fs-ops';

export interface RemovalOutcome {
	outcome: ExecutionOutcome.SUCCEEDED | ExecutionOutcome.FAILED | ExecutionOutcome.SKIPPED_ALREADY_ABSENT;
	sizeBytes: number | null;
	reason?: string;
}

/**
 * Best-effort size; a vanished or unreadable path is reported as unknown
 */
export async function measure(fsOps: FileSystemOps, target: string): Promise<number | null> {
	try {
		return await fsOps.sizeOf(target);
	} catch {
		return null;
	}
}

/**
 * Attempt every entry of a directory; returns the first failure, if any
 */
async function removeEntries(fsOps: FileSystemOps, dir: string): Promise<string | null> {
	let firstFailure: string | null = null;
	for (const entry of await fsOps.list(dir)) {
		try {
			await fsOps.remove(path.join(dir, entry));
		} catch (error) {
			firstFailure ??= describeError(error);
		}
	}
	return firstFailure;
}

/**
 * Delete a path (or only its entries). Failures are returned, never thrown.
 */
export async function removePath(fsOps: FileSystemOps, target: string, contentsOnly = false): Promise<RemovalOutcome> {
	try {
		if (!(await fsOps.exists(target))) {
			return { outcome: ExecutionOutcome.SKIPPED_ALREADY_ABSENT, sizeBytes: null };
		}
	} catch (error) {
		return { outcome: ExecutionOutcome.FAILED, sizeBytes: null, reason: describeError(error) };
	}

	const sizeBytes = await measure(fsOps, target);
	try {
		if (contentsOnly) {
			const reason = await removeEntries(fsOps, target);
			if (reason) return { outcome: ExecutionOutcome.FAILED, sizeBytes, reason };
		} else {
			await fsOps.remove(target);
			if (await fsOps.exists(target)) {
				return { outcome: ExecutionOutcome.FAILED, sizeBytes, reason: 'path still present after removal' };
			}
		}
		return { outcome: ExecutionOutcome.SUCCEEDED, sizeBytes };
	} catch (error) {
		return { outcome: ExecutionOutcome.FAILED, sizeBytes, reason: describeError(error) };
	}
}
