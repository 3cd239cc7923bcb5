import { KeyedWriteLock } from './keyedWriteLock';

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('KeyedWriteLock', () => {
    it('runs tasks for one key in submission order without overlap', async () => {
        const lock = new KeyedWriteLock();
        const events: string[] = [];
        const task = (name: string, ms: number) => lock.runExclusive('a.csv', async () => {
            events.push(`start:${name}`);
            await sleep(ms);
            events.push(`end:${name}`);
            return name;
        });

        const results = await Promise.all([task('first', 20), task('second', 1), task('third', 5)]);

        expect(results).toEqual(['first', 'second', 'third']);
        expect(events).toEqual(['start:first', 'end:first', 'start:second', 'end:second', 'start:third', 'end:third']);
        await expect(lock.drain()).resolves.toBeUndefined();
    });

    it('lets different keys proceed independently', async () => {
        const lock = new KeyedWriteLock();
        const events: string[] = [];
        const slow = lock.runExclusive('a.csv', async () => {
            await sleep(20);
            events.push('a');
        });
        const fast = lock.runExclusive('b.csv', async () => {
            events.push('b');
        });

        await Promise.all([slow, fast]);
        expect(events).toEqual(['b', 'a']);
    });

    it('releases the key when a task fails', async () => {
        const lock = new KeyedWriteLock();
        const failing = lock.runExclusive('a.json', async () => {
            throw new Error('disk full');
        });
        const next = lock.runExclusive('a.json', async () => 'written');

        await expect(failing).rejects.toThrow('disk full');
        await expect(next).resolves.toBe('written');
    });

    it('drain waits for queued work on every key', async () => {
        const lock = new KeyedWriteLock();
        let done = 0;
        const work = [
            lock.runExclusive('a', async () => {
                await sleep(10);
                done += 1;
            }),
            lock.runExclusive('b', async () => {
                await sleep(5);
                done += 1;
            }),
        ];

        await lock.drain();
        expect(done).toBe(2);
        await Promise.all(work);
    });
});
