/**
 * Console logger for devsweep, optionally mirrored to a plain-text log file
 */
import chalk from 'chalk';
import * as fs from 'fs-extra';

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	SILENT = 4,
}

const LABELS: Record<Exclude<LogLevel, LogLevel.SILENT>, string> = {
	[LogLevel.DEBUG]: 'DEBUG',
	[LogLevel.INFO]: 'INFO',
	[LogLevel.WARN]: 'WARN',
	[LogLevel.ERROR]: 'ERROR',
};

function colorFor(level: LogLevel): chalk.Chalk {
	switch (level) {
		case LogLevel.DEBUG:
			return chalk.gray;
		case LogLevel.WARN:
			return chalk.yellow;
		case LogLevel.ERROR:
			return chalk.red;
		default:
			return chalk.cyan;
	}
}

export type LogWriter = (line: string) => void;

export class Logger {
	private level: LogLevel;
	private filePath: string | null = null;

	constructor(
		level: LogLevel = LogLevel.INFO,
		private readonly write: LogWriter = (line) => process.stderr.write(line + '\n'),
	) {
		this.level = level;
	}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	getLevel(): LogLevel {
		return this.level;
	}

	/**
	 * Mirror every line (without colours, regardless of level) to a file, like `tee -a`
	 */
	attachFile(filePath: string): void {
		fs.ensureFileSync(filePath);
		this.filePath = filePath;
	}

	debug(message: string): void {
		this.log(LogLevel.DEBUG, message);
	}

	info(message: string): void {
		this.log(LogLevel.INFO, message);
	}

	warn(message: string): void {
		this.log(LogLevel.WARN, message);
	}

	error(message: string): void {
		this.log(LogLevel.ERROR, message);
	}

	private log(level: Exclude<LogLevel, LogLevel.SILENT>, message: string): void {
		const label = LABELS[level];
		if (this.filePath) {
			fs.appendFileSync(this.filePath, `[${new Date().toISOString()}] [${label}] ${message}\n`);
		}
		if (level < this.level) return;
		this.write(`${colorFor(level)(`[${label}]`)} ${message}`);
	}
}

export function createLogger(level: LogLevel = LogLevel.INFO, write?: LogWriter): Logger {
	return new Logger(level, write);
}

export const logger = createLogger();
