/**
 * src/utils/fileLogger.ts
 *
 * Dual-output logging: every line written to stdout/stderr (Crawlee's log
 * included) is also appended to a per-run file under LOGS_PATH:
 *
 *   outs/logs/scraping_20250114_093012.txt
 *
 * One file per run, named after the local start time, so earlier runs are
 * never overwritten.
 */

import * as fs from 'fs';
import * as path from 'path';

type WriteFn = typeof process.stdout.write;

let writeStream: fs.WriteStream | null = null;
let originalStdoutWrite: WriteFn | null = null;
let originalStderrWrite: WriteFn | null = null;

const pad = (n: number): string => String(n).padStart(2, '0');

/** `scraping_YYYYMMDD_HHMMSS.txt`, local time. */
export function buildLogFileName(date: Date): string {
    const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
    return `scraping_${day}_${time}.txt`;
}

function tee(original: WriteFn): WriteFn {
    return (
        chunk: string | Uint8Array,
        encodingOrCb?: BufferEncoding | ((err?: Error | null) => void),
        cb?: (err?: Error | null) => void
    ): boolean => {
        writeStream?.write(chunk);
        return typeof encodingOrCb === 'function'
            ? original(chunk, encodingOrCb)
            : original(chunk, encodingOrCb, cb);
    };
}

/**
 * Start mirroring output into a new run file.
 * Call ONCE at the start of a CLI command, before any log output.
 *
 * @returns absolute path of the run file
 */
export function initFileLogger(logsDir: string, startedAt: Date = new Date()): string {
    if (writeStream) closeFileLogger();

    const dir = path.resolve(logsDir);
    fs.mkdirSync(dir, { recursive: true });
    const file = path.join(dir, buildLogFileName(startedAt));

    writeStream = fs.createWriteStream(file, { flags: 'a', encoding: 'utf-8' });

    originalStdoutWrite = process.stdout.write.bind(process.stdout);
    originalStderrWrite = process.stderr.write.bind(process.stderr);
    process.stdout.write = tee(originalStdoutWrite);
    process.stderr.write = tee(originalStderrWrite);

    console.log(`[FileLogger] ✓ Logging to ${file}`);
    return file;
}

/** Restore stdout/stderr and close the run file. Call in the finally block. */
export function closeFileLogger(): void {
    if (originalStdoutWrite) {
        process.stdout.write = originalStdoutWrite;
        originalStdoutWrite = null;
    }
    if (originalStderrWrite) {
        process.stderr.write = originalStderrWrite;
        originalStderrWrite = null;
    }
    if (writeStream) {
        writeStream.end();
        writeStream = null;
    }
}
