import { StorageUnavailableError, UnknownTaskError } from '../../../src/core/errors.js';
import { ProgressPublisher } from '../../../src/core/progress.js';
import type { TaskSnapshot } from '../../../src/schemas/task.js';
import { flakyTaskStorage, memoryStorage, silentLogger } from '../../helpers/fakes.js';

function snapshot(seq: number, patch: Partial<TaskSnapshot> = {}): TaskSnapshot {
  return {
    taskId: 'task_1',
    kind: 'generate',
    status: seq === 0 ? 'pending' : 'running',
    step: seq === 0 ? null : 'data_gathering',
    progress: seq * 10,
    message: `seq ${seq}`,
    sources: [],
    cancelRequested: false,
    seq,
    createdAt: '2025-03-12T10:00:00.000Z',
    updatedAt: '2025-03-12T10:00:00.000Z',
    ...patch,
  };
}

describe('ProgressPublisher', () => {
  it('delivers the current snapshot first, then later ones, and ends after the terminal one', async () => {
    const publisher = new ProgressPublisher(memoryStorage(), silentLogger());
    await publisher.publish(snapshot(0));
    const sub = await publisher.subscribe('task_1');

    await publisher.publish(snapshot(1));
    await publisher.publish(snapshot(2, { status: 'completed', progress: 100 }));
    await publisher.publish(snapshot(3));

    const seen: number[] = [];
    for await (const s of sub) seen.push(s.seq);
    expect(seen).toEqual([0, 1, 2]);
    expect(publisher.subscriberCount('task_1')).toBe(0);
  });

  it('drops snapshots that are not newer than the latest', async () => {
    const publisher = new ProgressPublisher(memoryStorage(), silentLogger());
    await publisher.publish(snapshot(0));
    await publisher.publish(snapshot(2));
    await publisher.publish(snapshot(1));
    expect((await publisher.poll('task_1')).seq).toBe(2);
  });

  it('gives a late subscriber only the terminal snapshot', async () => {
    const publisher = new ProgressPublisher(memoryStorage(), silentLogger());
    await publisher.publish(snapshot(0));
    await publisher.publish(snapshot(1, { status: 'failed' }));

    const sub = await publisher.subscribe('task_1');
    const seen: TaskSnapshot[] = [];
    for await (const s of sub) seen.push(s);
    expect(seen.map((s) => s.status)).toEqual(['failed']);
  });

  it('fans out to every subscriber', async () => {
    const publisher = new ProgressPublisher(memoryStorage(), silentLogger());
    await publisher.publish(snapshot(0));
    const a = await publisher.subscribe('task_1');
    const b = await publisher.subscribe('task_1');
    expect(publisher.subscriberCount('task_1')).toBe(2);

    await publisher.publish(snapshot(1, { status: 'completed' }));
    const drain = async (sub: AsyncIterable<TaskSnapshot>) => {
      const out: number[] = [];
      for await (const s of sub) out.push(s.seq);
      return out;
    };
    expect(await drain(a)).toEqual([0, 1]);
    expect(await drain(b)).toEqual([0, 1]);
  });

  it('detaches a subscriber that stops iterating', async () => {
    const publisher = new ProgressPublisher(memoryStorage(), silentLogger());
    await publisher.publish(snapshot(0));
    const sub = await publisher.subscribe('task_1');
    for await (const s of sub) {
      expect(s.seq).toBe(0);
      break;
    }
    expect(sub.closed).toBe(true);
    expect(publisher.subscriberCount('task_1')).toBe(0);
  });

  it('answers polls from storage when it has no snapshot in memory', async () => {
    const storage = memoryStorage();
    await new ProgressPublisher(storage, silentLogger()).publish(snapshot(4));
    const restarted = new ProgressPublisher(storage, silentLogger());
    expect((await restarted.poll('task_1')).seq).toBe(4);
  });

  it('shows nothing to pollers or subscribers when the snapshot could not be stored', async () => {
    const { storage, failTaskWrites } = flakyTaskStorage();
    const publisher = new ProgressPublisher(storage, silentLogger());
    await publisher.publish(snapshot(0));
    const sub = await publisher.subscribe('task_1');

    failTaskWrites();
    await expect(publisher.publish(snapshot(1, { status: 'completed', progress: 100 }))).rejects.toBeInstanceOf(
      StorageUnavailableError,
    );
    expect((await publisher.poll('task_1')).seq).toBe(0);
    expect(publisher.subscriberCount('task_1')).toBe(1);

    await publisher.publish(snapshot(2, { status: 'completed', progress: 100 }));
    const seen: number[] = [];
    for await (const s of sub) seen.push(s.seq);
    expect(seen).toEqual([0, 2]);
  });

  it('rejects polls for unknown tasks', async () => {
    const publisher = new ProgressPublisher(memoryStorage(), silentLogger());
    await expect(publisher.poll('task_missing')).rejects.toBeInstanceOf(UnknownTaskError);
  });
});
