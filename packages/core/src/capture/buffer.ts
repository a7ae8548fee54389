/**
 * Capture buffers and the line writers that fill them
 */

import type { StreamName, TextSink } from '../types.js';
import type { CaptureBuffer } from './types.js';

export function createCaptureBuffer(name: string): CaptureBuffer {
    return { name, lines: [] };
}

/**
 * Splits written chunks into lines and appends them to a buffer, tagged
 * with one stream. A trailing partial line is held until flush().
 */
export class LineWriter implements TextSink {
    private pending = '';

    constructor(
        private readonly buffer: CaptureBuffer,
        private readonly stream: StreamName,
    ) {}

    write(chunk: string): boolean {
        this.pending += chunk;
        let newline = this.pending.indexOf('\n');
        while (newline !== -1) {
            this.buffer.lines.push({ stream: this.stream, text: this.pending.slice(0, newline) });
            this.pending = this.pending.slice(newline + 1);
            newline = this.pending.indexOf('\n');
        }
        return true;
    }

    flush(): void {
        if (this.pending.length > 0) {
            this.buffer.lines.push({ stream: this.stream, text: this.pending });
            this.pending = '';
        }
    }
}

/**
 * Text of the lines from one stream (or all), newline-terminated.
 */
export function bufferText(buffer: CaptureBuffer, stream?: StreamName): string {
    return buffer.lines
        .filter((line) => !stream || line.stream === stream)
        .map((line) => `${line.text}\n`)
        .join('');
}
