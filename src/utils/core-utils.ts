/**
 * Process helpers: PATH lookup and running external tools
 */
import { spawn } from 'child_process';
import * as path from 'path';
import * as fs from 'fs';
import { CommandError } from './errors';

/**
 * Check if running on Windows
 */
export function isWindows(): boolean {
	return process.platform === 'win32';
}

/**
 * Check if a file exists at the given path
 */
export function fileExists(p: string): boolean {
	try {
		return fs.existsSync(p);
	} catch {
		return false;
	}
}

/**
 * Resolve an executable from PATH environment variable
 */
export function resolveFromPATH(name: string, envPath: string = process.env.PATH || ''): string | null {
	const exts = isWindows() ? ['.exe', '.cmd', ''] : [''];
	const parts = envPath.split(path.delimiter).filter(Boolean);
	for (const dir of parts) {
		for (const ext of exts) {
			const candidate = path.join(dir, name + ext);
			if (fileExists(candidate)) return candidate;
		}
	}
	return null;
}

export interface CommandResult {
	stdout: string;
	stderr: string;
	code: number;
}

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

/**
 * Run a command and collect its output. Rejects with CommandError only if it cannot be spawned.
 */
export const runCommand: CommandRunner = (command, args) => {
	return new Promise((resolve, reject) => {
		const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], env: process.env });
		let out = '';
		let err = '';
		child.stdout.on('data', (d: Buffer) => out += d.toString());
		child.stderr.on('data', (d: Buffer) => err += d.toString());
		child.on('error', (error) => reject(new CommandError(`Failed to run ${command}: ${error.message}`, command)));
		child.on('close', (code) => resolve({ stdout: out, stderr: err, code: code ?? 1 }));
	});
};
