import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SessionStore } from '../src/session-store';
import { SessionFile } from '../src/storage';
import { parseTimestamp } from '../src/timestamp';
import {
  AlreadyRunningError,
  NotRunningError,
  StorageIOError,
  Timestamp,
  ValidationError,
} from '../src/types';

describe('SessionStore', () => {
  let dir: string;
  let filePath: string;
  let file: SessionFile;
  let store: SessionStore;
  let current: Timestamp;

  function advance(seconds: number): void {
    current = { ...current, epochMs: current.epochMs + seconds * 1000 };
  }

  function readDisk(): unknown {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'timeclock-store-'));
    filePath = path.join(dir, 'sessions.json');
    current = parseTimestamp('2024-01-02T09:00:00-05:00');
    file = new SessionFile(filePath);
    store = new SessionStore(file, { now: () => current });
    store.load();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('start', () => {
    test('appends a running session and persists it', () => {
      const session = store.start('write report');

      expect(session.start).toEqual(current);
      expect(session.end).toBeNull();
      expect(session.note).toBe('write report');
      expect(store.list()).toEqual([session]);
      expect(store.state()).toBe('running');
      expect(readDisk()).toEqual({
        sessions: [{ start_iso: '2024-01-02T09:00:00-05:00', end_iso: null, note: 'write report' }],
      });
    });

    test('fails while running and leaves everything unchanged', () => {
      store.start('first');
      const before = store.list();
      const diskBefore = fs.readFileSync(filePath, 'utf-8');

      advance(60);
      expect(() => store.start('second')).toThrow(AlreadyRunningError);
      expect(() => store.start('second')).toThrow(
        'Cannot start: a session has been running since 2024-01-02T09:00:00-05:00'
      );
      expect(store.list()).toBe(before);
      expect(store.list()).toHaveLength(1);
      expect(fs.readFileSync(filePath, 'utf-8')).toBe(diskBefore);
    });
  });

  describe('stop', () => {
    test('closes the running session without changing the length', () => {
      const started = store.start();
      advance(1800);

      const closed = store.stop();

      expect(closed.id).toBe(started.id);
      expect(closed.end).toEqual(current);
      expect(store.list()).toHaveLength(1);
      expect(store.state()).toBe('idle');
      expect(readDisk()).toEqual({
        sessions: [
          {
            start_iso: '2024-01-02T09:00:00-05:00',
            end_iso: '2024-01-02T09:30:00-05:00',
            note: '',
          },
        ],
      });
    });

    test('fails while idle without writing the file', () => {
      const save = jest.spyOn(file, 'save');
      const diskBefore = fs.readFileSync(filePath, 'utf-8');
      const mtimeBefore = fs.statSync(filePath).mtimeMs;

      expect(() => store.stop()).toThrow(NotRunningError);
      expect(save).not.toHaveBeenCalled();
      expect(fs.readFileSync(filePath, 'utf-8')).toBe(diskBefore);
      expect(fs.statSync(filePath).mtimeMs).toBe(mtimeBefore);
    });
  });

  test('sessions handed out cannot be changed behind the store', () => {
    store.start('a');
    advance(60);
    const closed = store.stop();

    expect(Object.isFrozen(closed)).toBe(true);
    expect(Object.isFrozen(store.list())).toBe(true);
    expect(() => Object.assign(closed, { end: null })).toThrow(TypeError);
    expect(() => Object.assign(closed.start, { epochMs: 0 })).toThrow(TypeError);
    expect(store.state()).toBe('idle');
    expect(store.list()[0].end).toEqual(current);
  });

  describe('toggle', () => {
    test('alternates between starting and stopping', () => {
      const first = store.toggle('focus');
      advance(120);
      const second = store.toggle('ignored');

      expect(first.action).toBe('started');
      expect(first.session.note).toBe('focus');
      expect(second.action).toBe('stopped');
      expect(second.session.id).toBe(first.session.id);
      expect(second.session.note).toBe('focus');
      expect(store.state()).toBe('idle');
    });
  });

  describe('delete', () => {
    test('removes sessions by id and keeps the order of the rest', () => {
      const notes = ['a', 'b', 'c', 'd'];
      const ids = notes.map((note) => {
        const session = store.start(note);
        advance(60);
        store.stop();
        return session.id;
      });

      const removed = store.delete([ids[0], ids[2]]);

      expect(removed.map((session) => session.note)).toEqual(['a', 'c']);
      expect(store.list().map((session) => session.note)).toEqual(['b', 'd']);
      expect(readDisk()).toEqual({
        sessions: [
          { start_iso: '2024-01-02T09:01:00-05:00', end_iso: '2024-01-02T09:02:00-05:00', note: 'b' },
          { start_iso: '2024-01-02T09:03:00-05:00', end_iso: '2024-01-02T09:04:00-05:00', note: 'd' },
        ],
      });
    });

    test('deleting the running session returns the store to idle', () => {
      const running = store.start('oops');
      store.delete([running.id]);

      expect(store.state()).toBe('idle');
      expect(() => store.start('again')).not.toThrow();
      expect(store.list().map((session) => session.note)).toEqual(['again']);
    });

    test('ignores unknown ids without writing', () => {
      store.start();
      const save = jest.spyOn(file, 'save');

      expect(store.delete(['missing'])).toEqual([]);
      expect(save).not.toHaveBeenCalled();
      expect(store.list()).toHaveLength(1);
    });
  });

  describe('persistence', () => {
    test('a failed write leaves the in-memory list unchanged so the call can be retried', () => {
      jest
        .spyOn(file, 'save')
        .mockImplementationOnce(() => {
          throw new StorageIOError('disk full');
        });

      expect(() => store.start('retry me')).toThrow(StorageIOError);
      expect(store.list()).toEqual([]);
      expect(store.state()).toBe('idle');

      expect(store.start('retry me').note).toBe('retry me');
      expect(store.list()).toHaveLength(1);
    });

    test('load derives the running state from the file', () => {
      fs.writeFileSync(
        filePath,
        JSON.stringify({
          sessions: [
            { start_iso: '2024-01-02T07:00:00-05:00', end_iso: '2024-01-02T08:00:00-05:00', note: '' },
            { start_iso: '2024-01-02T08:30:00-05:00', end_iso: null, note: 'ongoing' },
          ],
        }),
        'utf-8'
      );

      const reopened = new SessionStore(new SessionFile(filePath), { now: () => current });
      reopened.load();

      expect(reopened.state()).toBe('running');
      expect(Object.isFrozen(reopened.running())).toBe(true);
      expect(reopened.running()?.note).toBe('ongoing');
      expect(reopened.stop().end).toEqual(current);
    });

    test('save(load()) leaves the file content unchanged', () => {
      store.start('one');
      advance(90);
      store.stop();
      store.start('two');
      const before = fs.readFileSync(filePath, 'utf-8');

      store.save(store.load());

      expect(fs.readFileSync(filePath, 'utf-8')).toBe(before);
      expect(store.state()).toBe('running');
    });

    test('save rejects a collection with two running sessions', () => {
      const running = store.start('one');
      const twin = { ...running, id: 'twin' };

      expect(() => store.save([running, twin])).toThrow(ValidationError);
      expect(store.list()).toEqual([running]);
    });
  });

  test('start and stop keep at most one session running and never shrink the list', () => {
    const operations = ['start', 'start', 'stop', 'stop', 'start', 'stop', 'start', 'start'];
    let previousLength = 0;

    for (const operation of operations) {
      advance(30);
      try {
        if (operation === 'start') {
          store.start(operation);
        } else {
          store.stop();
        }
      } catch (error) {
        expect(error).toBeInstanceOf(
          operation === 'start' ? AlreadyRunningError : NotRunningError
        );
      }

      const sessions = store.list();
      expect(sessions.filter((session) => session.end === null).length).toBeLessThanOrEqual(1);
      if (operation === 'stop') {
        expect(sessions).toHaveLength(previousLength);
      } else {
        expect(sessions.length).toBeGreaterThanOrEqual(previousLength);
      }
      previousLength = sessions.length;
    }

    expect(previousLength).toBe(3);
  });
});
