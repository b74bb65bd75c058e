/**
 * src/utils/fileLogger.ts
 *
 * Dual-output logging: everything written to stdout/stderr (crawlee's `log`
 * and console alike) is also appended to a log file.
 *
 * BEHAVIOUR
 * ─────────
 *  • initFileLogger() TRUNCATES the file, so every run starts clean.
 *  • Writes pass through to the terminal unchanged; the file gets a copy.
 *  • Past MAX_LOG_SIZE the mirror stops (with a note in the file) while the
 *    terminal keeps receiving output.
 *  • closeFileLogger() restores the original streams and resolves once the
 *    file is flushed.
 */

import * as fs from 'fs';
import * as path from 'path';

const MAX_LOG_SIZE = 25 * 1024 * 1024; // 25 MB

type WriteCallback = (err?: Error | null) => void;
type StreamWrite = typeof process.stdout.write;

let writeStream: fs.WriteStream | null = null;
let logFilePath: string | null = null;
let bytesWritten = 0;
const restorers: Array<() => void> = [];

function mirror(chunk: Uint8Array | string): void {
    if (!writeStream) return;

    const size = typeof chunk === 'string' ? Buffer.byteLength(chunk) : chunk.byteLength;
    if (bytesWritten + size > MAX_LOG_SIZE) {
        writeStream.write(`\n--- LOG CAPPED AT ${new Date().toISOString()} (${MAX_LOG_SIZE / 1024 / 1024}MB) ---\n`);
        writeStream.end();
        writeStream = null;
        return;
    }
    bytesWritten += size;
    writeStream.write(chunk);
}

function tee(stream: NodeJS.WriteStream): void {
    const original = stream.write;
    const passThrough: StreamWrite = original.bind(stream);

    stream.write = (
        chunk: Uint8Array | string,
        encodingOrCb?: BufferEncoding | WriteCallback,
        cb?: WriteCallback
    ): boolean => {
        mirror(chunk);
        return typeof encodingOrCb === 'function'
            ? passThrough(chunk, encodingOrCb)
            : passThrough(chunk, encodingOrCb, cb);
    };

    restorers.push(() => {
        stream.write = original;
    });
}

/**
 * Initialise the file logger.
 * Call ONCE near the start of the CLI, before any log output worth keeping.
 */
export function initFileLogger(file = 'log.txt'): string {
    if (writeStream) closeStreams();

    logFilePath = path.resolve(process.cwd(), file);
    fs.writeFileSync(logFilePath, '', 'utf-8');
    writeStream = fs.createWriteStream(logFilePath, { flags: 'a', encoding: 'utf-8' });
    bytesWritten = 0;

    tee(process.stdout);
    tee(process.stderr);

    console.log(`[FileLogger] ✓ Logging to ${logFilePath}`);
    return logFilePath;
}

function closeStreams(): fs.WriteStream | null {
    while (restorers.length > 0) {
        restorers.pop()?.();
    }
    const stream = writeStream;
    writeStream = null;
    logFilePath = null;
    return stream;
}

/**
 * Restore stdout/stderr and flush the log file.
 */
export function closeFileLogger(): Promise<void> {
    const stream = closeStreams();
    if (!stream) return Promise.resolve();

    return new Promise((resolve) => {
        stream.end(() => resolve());
    });
}
