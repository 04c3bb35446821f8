import * as fs from 'fs';
import * as path from 'path';
import { nanoid } from 'nanoid';
import { formatTimestamp, parseTimestamp } from './timestamp';
import {
  Session,
  StorageCorruptError,
  StorageIOError,
  Timestamp,
  ValidationError,
} from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON file holding the session collection.
 *
 * Layout: `{"sessions": [{"start_iso": ..., "end_iso": ... | null, "note": ...}]}`.
 * Fields this version does not recognise, at either level, are written back as read.
 */
export class SessionFile {
  private rootExtra: Record<string, unknown> = {};

  constructor(readonly filePath: string) {}

  // ============ Load / Save ============

  /**
   * Read the collection, creating an empty file first if none exists
   */
  load(): Session[] {
    if (!fs.existsSync(this.filePath)) {
      this.rootExtra = {};
      this.save([]);
    }

    let text: string;
    try {
      text = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      throw new StorageIOError(`Failed to read ${this.filePath}: ${error}`, { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new StorageCorruptError(`${this.filePath} is not valid JSON: ${error}`, {
        cause: error,
      });
    }

    return this.decode(raw);
  }

  /**
   * Write the collection to a temp file beside the real one, then rename it into place.
   * A failure at any step leaves the previous file intact.
   */
  save(sessions: readonly Session[]): void {
    const payload = JSON.stringify(
      { sessions: sessions.map((session) => this.encode(session)), ...this.rootExtra },
      null,
      2
    );
    const tmpPath = `${this.filePath}.tmp`;

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const fd = fs.openSync(tmpPath, 'w');
      try {
        fs.writeSync(fd, payload);
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
      fs.renameSync(tmpPath, this.filePath);
    } catch (error) {
      this.discardTemp(tmpPath);
      throw new StorageIOError(`Failed to write ${this.filePath}: ${error}`, { cause: error });
    }
  }

  /**
   * Move an unreadable file aside so the caller can start over.
   * Returns the path the file was moved to.
   */
  quarantine(date: Date = new Date()): string {
    const target = `${this.filePath}.corrupt-${date.toISOString().replace(/[:.]/g, '-')}`;
    try {
      fs.renameSync(this.filePath, target);
    } catch (error) {
      throw new StorageIOError(`Failed to move ${this.filePath} aside: ${error}`, {
        cause: error,
      });
    }
    this.rootExtra = {};
    return target;
  }

  // ============ Encoding ============

  private decode(raw: unknown): Session[] {
    if (!isRecord(raw)) {
      throw new StorageCorruptError(`${this.filePath} does not hold a JSON object`);
    }

    const { sessions: records, ...rest } = raw;
    if (!Array.isArray(records)) {
      throw new StorageCorruptError(`${this.filePath} has no "sessions" array`);
    }
    const sessions = records.map((record: unknown, index: number) =>
      this.decodeRecord(record, index)
    );

    const runningCount = sessions.filter((session) => session.end === null).length;
    if (runningCount > 1) {
      throw new StorageCorruptError(
        `${this.filePath} has ${runningCount} running sessions; at most one is allowed`
      );
    }

    sessions.forEach((session, index) => {
      if (session.end && session.end.epochMs < session.start.epochMs) {
        console.warn(
          `Session ${index + 1} in ${this.filePath} ends before it starts; counting it as zero seconds`
        );
      }
    });

    this.rootExtra = rest;
    return sessions;
  }

  private decodeRecord(record: unknown, index: number): Session {
    const where = `${this.filePath}: session ${index + 1}`;
    if (!isRecord(record)) {
      throw new StorageCorruptError(`${where} is not an object`);
    }

    const { start_iso: startText, end_iso: endText, note, ...extra } = record;
    if (typeof startText !== 'string') {
      throw new StorageCorruptError(`${where} has no start_iso string`);
    }
    let end: Timestamp | null = null;
    if (typeof endText === 'string') {
      end = this.decodeTimestamp(endText, where);
    } else if (endText !== null) {
      throw new StorageCorruptError(`${where} has an end_iso that is neither a string nor null`);
    }
    if (typeof note !== 'string') {
      throw new StorageCorruptError(`${where} has no note string`);
    }

    return {
      id: nanoid(),
      start: this.decodeTimestamp(startText, where),
      end,
      note,
      extra,
    };
  }

  private decodeTimestamp(text: string, where: string): Timestamp {
    try {
      return parseTimestamp(text);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new StorageCorruptError(`${where}: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }

  private encode(session: Session): Record<string, unknown> {
    return {
      start_iso: formatTimestamp(session.start),
      end_iso: session.end ? formatTimestamp(session.end) : null,
      note: session.note,
      ...session.extra,
    };
  }

  private discardTemp(tmpPath: string): void {
    try {
      fs.unlinkSync(tmpPath);
    } catch {
      // Ignore: the temp file may never have been created
    }
  }
}
