import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { LicenseRepository } from '../../repositories';
import { createMemoryDB } from '../../utils/db';
import { Logger } from '../../utils/logger';
import { WebhookAlertSink } from '../alerts/security-alerts';
import { AuditLogger } from '../audit';
import { BackgroundTasks } from '../tasks/background-tasks';

function deferredWork() {
    const releases: (() => void)[] = [];
    let started = 0;
    const work = () => new Promise<void>((resolve) => {
        started++;
        releases.push(resolve);
    });
    return {
        work,
        started: () => started,
        releaseAll: () => releases.splice(0).forEach(release => release()),
    };
}

describe('BackgroundTasks', () => {
    let logger: Logger;
    let tasks: BackgroundTasks;

    beforeEach(() => {
        logger = new Logger('error');
        tasks = new BackgroundTasks(1_000, logger, 3);
    });

    afterEach(async () => {
        await tasks.shutdown(100);
    });

    it('should drop work scheduled past the in-flight limit', async () => {
        const gate = deferredWork();

        const accepted = Array.from({ length: 10 }, (_, i) => tasks.run(`job-${i}`, gate.work));
        await Promise.resolve();

        expect(accepted).toEqual([true, true, true, false, false, false, false, false, false, false]);
        expect(tasks.pending).toBe(3);
        expect(tasks.dropped).toBe(7);
        expect(gate.started()).toBe(3);

        gate.releaseAll();
        await tasks.drain();

        expect(tasks.pending).toBe(0);
        expect(gate.started()).toBe(3);
    });

    it('should accept work again once tasks finish', async () => {
        const gate = deferredWork();
        for (let i = 0; i < 4; i++) {
            tasks.run(`job-${i}`, gate.work);
        }

        gate.releaseAll();
        await tasks.drain();

        expect(tasks.run('job-after', gate.work)).toBe(true);
        expect(tasks.pending).toBe(1);
        gate.releaseAll();
    });

    it('should warn once per saturated stretch', async () => {
        const warn = vi.spyOn(logger, 'warn');
        const gate = deferredWork();

        for (let i = 0; i < 8; i++) {
            tasks.run(`job-${i}`, gate.work);
        }
        gate.releaseAll();
        await tasks.drain();
        for (let i = 0; i < 5; i++) {
            tasks.run(`job-${i}`, gate.work);
        }

        const drops = warn.mock.calls.filter(([message]) => message === 'Background task dropped');
        expect(drops).toHaveLength(2);
        expect(drops[0]?.[1]).toEqual({ task: 'job-3', maxInFlight: 3 });
        gate.releaseAll();
    });

    it('should log failures and keep going', async () => {
        const warn = vi.spyOn(logger, 'warn');

        tasks.run('broken', () => Promise.reject(new Error('upstream 502')));
        await tasks.drain();

        expect(warn).toHaveBeenCalledWith('Background task failed', { task: 'broken', error: 'upstream 502' });
        expect(tasks.pending).toBe(0);
    });
});

describe('security alerts under a burst of denials', () => {
    it('should send a bounded number of alert requests', async () => {
        const logger = new Logger('error');
        const tasks = new BackgroundTasks(1_000, logger, 5);
        const sink = new WebhookAlertSink(tasks, logger, 'https://alerts.example.test/hook');
        const audit = new AuditLogger(new LicenseRepository(createMemoryDB()), sink, logger);
        const fetchSpy = vi.spyOn(globalThis, 'fetch').mockImplementation((_input, init) =>
            new Promise<Response>((_resolve, reject) => {
                const signal = init?.signal;
                if (signal?.aborted) {
                    reject(new Error('aborted'));
                    return;
                }
                signal?.addEventListener('abort', () => reject(new Error('aborted')));
            })
        );

        for (let i = 0; i < 50; i++) {
            await audit.logSecurityEvent('rate_limit_exceeded', {
                endpoint: 'validate',
                subject_type: 'ip',
                ip_address: '198.51.100.23',
            }, { requestId: `req_${i}` });
        }

        expect(fetchSpy).toHaveBeenCalledTimes(5);
        expect(tasks.pending).toBe(5);
        expect(tasks.dropped).toBe(45);

        await tasks.shutdown(1_000);

        expect(tasks.pending).toBe(0);
    });
});
