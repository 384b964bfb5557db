import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import test from 'node:test';

import { InMemoryAttendanceStore } from '../src/features/signup/attendanceStore.js';
import { defaultAttendanceState, type AttendanceState } from '../src/state.js';
import { JsonStorage } from '../src/utils/storage.js';

class FlakyStorage extends JsonStorage<AttendanceState> {
  failWrites = false;

  override async write(data: AttendanceState): Promise<void> {
    if (this.failWrites) {
      throw new Error('disk full');
    }
    await super.write(data);
  }
}

const withFlakyStore = async (run: (store: InMemoryAttendanceStore, storage: FlakyStorage) => Promise<void>) => {
  const dir = await mkdtemp(join(tmpdir(), 'attendance-'));
  try {
    const storage = new FlakyStorage(join(dir, 'attendance.json'), defaultAttendanceState);
    await run(new InMemoryAttendanceStore(storage), storage);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
};

test('attendanceStore: toggling adds then removes a member', async () => {
  const store = new InMemoryAttendanceStore();
  assert.deepEqual(await store.toggle('g1', 'u1'), { present: true, size: 1 });
  assert.deepEqual(await store.toggle('g1', 'u1'), { present: false, size: 0 });
  assert.deepEqual(await store.list('g1'), []);
});

test('attendanceStore: concurrent toggles on one guild lose no updates', async () => {
  const store = new InMemoryAttendanceStore();
  const userIds = Array.from({ length: 20 }, (_, index) => `u${index}`);
  const results = await Promise.all(userIds.map((userId) => store.toggle('g1', userId)));

  assert.deepEqual(
    results.map((result) => result.size),
    Array.from({ length: 20 }, (_, index) => index + 1)
  );
  assert.deepEqual(await store.list('g1'), userIds);
});

test('attendanceStore: concurrent toggles of one member apply in call order', async () => {
  const store = new InMemoryAttendanceStore();
  const [first, second, third] = await Promise.all([
    store.toggle('g1', 'u1'),
    store.toggle('g1', 'u1'),
    store.toggle('g1', 'u1')
  ]);
  assert.deepEqual([first.present, second.present, third.present], [true, false, true]);
  assert.deepEqual(await store.list('g1'), ['u1']);
});

test('attendanceStore: takeAll empties only the requested guild', async () => {
  const store = new InMemoryAttendanceStore();
  await store.toggle('g1', 'u1');
  await store.toggle('g1', 'u2');
  await store.toggle('g2', 'u3');

  assert.deepEqual(await store.takeAll('g1'), ['u1', 'u2']);
  assert.deepEqual(await store.list('g1'), []);
  assert.deepEqual(await store.list('g2'), ['u3']);
  assert.deepEqual(await store.takeAll('g1'), []);
});

test('attendanceStore: restore puts members back', async () => {
  const store = new InMemoryAttendanceStore();
  await store.toggle('g1', 'u3');
  await store.restore('g1', ['u1', 'u2', 'u3']);
  assert.deepEqual(await store.list('g1'), ['u3', 'u1', 'u2']);
});

test('attendanceStore: persists the queue when storage is configured', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'attendance-'));
  try {
    const file = join(dir, 'attendance.json');
    const storage = new JsonStorage<AttendanceState>(file, defaultAttendanceState);
    const store = new InMemoryAttendanceStore(storage);
    await store.toggle('g1', 'u1');
    await store.toggle('g2', 'u2');

    assert.deepEqual(JSON.parse(await readFile(file, 'utf8')), { guilds: { g1: ['u1'], g2: ['u2'] } });

    const reloaded = new InMemoryAttendanceStore(new JsonStorage<AttendanceState>(file, defaultAttendanceState));
    assert.deepEqual(await reloaded.list('g1'), ['u1']);

    await reloaded.takeAll('g1');
    assert.deepEqual(JSON.parse(await readFile(file, 'utf8')), { guilds: { g2: ['u2'] } });
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test('attendanceStore: ignores stored data with an unexpected shape', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'attendance-'));
  try {
    const file = join(dir, 'attendance.json');
    await writeFile(file, JSON.stringify({ guilds: 5 }), 'utf8');
    const store = new InMemoryAttendanceStore(new JsonStorage<AttendanceState>(file, defaultAttendanceState));
    assert.deepEqual(await store.list('g1'), []);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test('attendanceStore: a failed write leaves takeAll without effect', async () => {
  await withFlakyStore(async (store, storage) => {
    await store.toggle('g1', 'u1');
    await store.toggle('g1', 'u2');
    storage.failWrites = true;

    await assert.rejects(store.takeAll('g1'), /disk full/);
    assert.deepEqual(await store.list('g1'), ['u1', 'u2']);
    assert.deepEqual(JSON.parse(await readFile(storage.path, 'utf8')), { guilds: { g1: ['u1', 'u2'] } });
  });
});

test('attendanceStore: a failed write leaves toggle and restore without effect', async () => {
  await withFlakyStore(async (store, storage) => {
    await store.toggle('g1', 'u1');
    storage.failWrites = true;

    await assert.rejects(store.toggle('g1', 'u1'), /disk full/);
    await assert.rejects(store.toggle('g1', 'u2'), /disk full/);
    await assert.rejects(store.restore('g1', ['u3']), /disk full/);
    assert.deepEqual(await store.list('g1'), ['u1']);

    storage.failWrites = false;
    assert.deepEqual(await store.toggle('g1', 'u2'), { present: true, size: 2 });
  });
});
