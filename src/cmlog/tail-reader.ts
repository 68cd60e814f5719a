import fs from "node:fs/promises";

const DEFAULT_MAX_BYTES = 64 * 1024;
const DEFAULT_CHUNK_SIZE = 64 * 1024;
const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

/**
 * Result from reading the end of a log.
 */
export type TailReadResult = {
  /** File size when the read started */
  size: number;
  /** Lines read from the file */
  lines: string[];
  /** Whether the read was truncated due to size limits */
  truncated: boolean;
};

/**
 * One complete line and the byte offset just past its terminator.
 */
export type LineChunk = {
  line: string;
  end: number;
};

function decodeLine(buffer: Buffer): string {
  let length = buffer.length;
  if (length > 0 && buffer[length - 1] === CARRIAGE_RETURN) {
    length -= 1;
  }
  return buffer.toString("utf8", 0, length);
}

/**
 * Reads the last `maxBytes` of a file and drops the partial first line.
 */
export async function readLogSlice(params: {
  file: string;
  maxBytes?: number;
}): Promise<TailReadResult> {
  const maxBytes = params.maxBytes ?? DEFAULT_MAX_BYTES;

  const stat = await fs.stat(params.file);
  const size = stat.size;
  const start = Math.max(0, size - maxBytes);
  const truncated = start > 0;

  if (size === 0 || size <= start) {
    return { size, lines: [], truncated };
  }

  const handle = await fs.open(params.file, "r");
  try {
    let prefix = NEWLINE;
    if (start > 0) {
      // Check if we're starting mid-line
      const prefixBuf = Buffer.alloc(1);
      const prefixRead = await handle.read(prefixBuf, 0, 1, start - 1);
      if (prefixRead.bytesRead > 0) {
        prefix = prefixBuf[0];
      }
    }

    const length = size - start;
    const buffer = Buffer.alloc(length);
    const readResult = await handle.read(buffer, 0, length, start);
    const data = buffer.subarray(0, readResult.bytesRead);

    const lines: string[] = [];
    let lineStart = 0;
    for (let i = 0; i < data.length; i += 1) {
      if (data[i] === NEWLINE) {
        lines.push(decodeLine(data.subarray(lineStart, i)));
        lineStart = i + 1;
      }
    }
    if (lineStart < data.length) {
      lines.push(decodeLine(data.subarray(lineStart)));
    }

    // If we started mid-line, drop the partial first line
    if (start > 0 && prefix !== NEWLINE) {
      lines.shift();
    }

    return { size, lines, truncated };
  } finally {
    await handle.close();
  }
}

/**
 * Reads the last `count` lines, widening the window from the end of the file
 * until enough complete lines are found or the whole file has been read.
 */
export async function readLastLines(params: {
  file: string;
  count: number;
  maxBytes?: number;
}): Promise<string[]> {
  if (params.count <= 0) {
    return [];
  }
  let maxBytes = params.maxBytes ?? DEFAULT_MAX_BYTES;
  for (;;) {
    const slice = await readLogSlice({ file: params.file, maxBytes });
    if (slice.lines.length >= params.count || !slice.truncated) {
      return slice.lines.slice(-params.count);
    }
    maxBytes *= 2;
  }
}

/**
 * Streams lines between two byte offsets in chunks.
 * With `holdPartial`, a trailing line without a newline is not yielded, so the
 * last chunk's `end` is where the next read should resume.
 */
export async function* readLines(params: {
  file: string;
  start?: number;
  end: number;
  holdPartial?: boolean;
  chunkSize?: number;
}): AsyncGenerator<LineChunk> {
  const chunkSize = params.chunkSize ?? DEFAULT_CHUNK_SIZE;
  let position = params.start ?? 0;
  if (position >= params.end) {
    return;
  }

  const handle = await fs.open(params.file, "r");
  try {
    let pending: Buffer = Buffer.alloc(0);
    let pendingStart = position;

    while (position < params.end) {
      const length = Math.min(chunkSize, params.end - position);
      const chunk = Buffer.alloc(length);
      const { bytesRead } = await handle.read(chunk, 0, length, position);
      if (bytesRead === 0) {
        break;
      }
      position += bytesRead;

      const fresh = chunk.subarray(0, bytesRead);
      const data = pending.length > 0 ? Buffer.concat([pending, fresh]) : fresh;
      let lineStart = 0;
      let index = data.indexOf(NEWLINE, lineStart);
      while (index !== -1) {
        yield { line: decodeLine(data.subarray(lineStart, index)), end: pendingStart + index + 1 };
        lineStart = index + 1;
        index = data.indexOf(NEWLINE, lineStart);
      }
      pending = Buffer.from(data.subarray(lineStart));
      pendingStart += lineStart;
    }

    if (pending.length > 0 && !params.holdPartial) {
      yield { line: decodeLine(pending), end: pendingStart + pending.length };
    }
  } finally {
    await handle.close();
  }
}
