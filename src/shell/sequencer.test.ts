/**
 * SHELL: Sequencer Tests
 * Commands and ticks end to end, on a virtual clock.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { MemoryLogger } from '../core/logger';
import { DEFAULT_CONFIG, MAX_PERIOD_MS } from '../core/state';
import { Sequencer, type BlockEvent, type PhaseChange } from './sequencer';
import { ManualTimerHost } from './timer-host';

function setup(batchSize = 4) {
    const host = new ManualTimerHost();
    const logger = new MemoryLogger();
    const sequencer = new Sequencer({ config: { ...DEFAULT_CONFIG, batchSize }, host, logger });
    const blocks: BlockEvent[] = [];
    sequencer.onBlock((block) => blocks.push(block));
    return { host, logger, sequencer, blocks };
}

describe('Sequencer', () => {
    it('starts, emits the seed block at once and continues every period', () => {
        const { host, sequencer, blocks } = setup();

        const status = sequencer.submit('start');
        assert.deepStrictEqual(status, {
            ok: true,
            kind: 'info',
            message: 'Started from (0, 1).',
            phase: 'running',
        });

        host.advance(0);
        host.advance(1000);
        assert.deepStrictEqual(blocks.map((b) => b.terms), [
            [0n, 1n, 1n, 2n],
            [3n, 5n, 8n, 13n],
        ]);
        assert.deepStrictEqual(sequencer.snapshot().current, { a: 8n, b: 13n });
    });

    it('rejects start 5 3 without touching the state', () => {
        const { host, sequencer } = setup();

        const status = sequencer.submit('start', '5 3');
        assert.strictEqual(status.ok, false);
        assert.strictEqual(status.kind, 'InvalidSeed');
        assert.strictEqual(status.hint, 'Try: start 0 1');
        assert.strictEqual(sequencer.phase, 'stopped');
        assert.deepStrictEqual(sequencer.snapshot().start, { a: 0n, b: 1n });
        assert.strictEqual(host.pendingCount, 0);
    });

    it('rejects pause and restart while stopped and reports stop as a no-op', () => {
        const { sequencer } = setup();

        const pause = sequencer.submit('pause');
        assert.strictEqual(pause.kind, 'IllegalTransition');
        assert.strictEqual(pause.message, 'No sequence is running.');

        const restart = sequencer.submit('restart');
        assert.strictEqual(restart.kind, 'IllegalTransition');
        assert.strictEqual(restart.message, 'No active sequence to restart.');

        const stop = sequencer.submit('stop');
        assert.strictEqual(stop.ok, true);
        assert.strictEqual(stop.message, 'Sequence is already stopped.');
        assert.strictEqual(sequencer.phase, 'stopped');
    });

    it('truncates at max 50 and stops after that emission', () => {
        const { host, logger, sequencer, blocks } = setup();
        sequencer.submit('max', '50');
        sequencer.submit('start');

        host.advance(0);
        host.advance(1000);
        host.advance(1000);

        assert.deepStrictEqual(blocks[2], { terms: [21n, 34n], truncated: true });
        assert.strictEqual(sequencer.phase, 'stopped');
        assert.deepStrictEqual(sequencer.snapshot().current, { a: 0n, b: 1n });
        assert.strictEqual(host.pendingCount, 0);
        assert.deepStrictEqual(logger.messages('info'), ['Reached maximum 50. Stopped.']);

        host.advance(5000);
        assert.strictEqual(blocks.length, 3);
    });

    it('treats the same max twice like once', () => {
        const { sequencer } = setup();
        sequencer.submit('max', '50');
        const once = sequencer.snapshot();
        sequencer.submit('max', '50');

        assert.deepStrictEqual(sequencer.snapshot(), once);
    });

    it('reconciles speed 0.1 then speed 2 into a wait of at most two seconds', () => {
        const { host, sequencer } = setup();
        sequencer.submit('start');
        host.advance(0);
        host.advance(300);

        sequencer.submit('speed', '0.1');
        assert.strictEqual(sequencer.snapshot().config.periodMs, 200);
        assert.strictEqual(sequencer.nextTickIn(), 0);

        sequencer.submit('speed', '2');
        const wait = sequencer.nextTickIn();
        assert.strictEqual(wait, 1800);
        assert.ok(wait !== null && wait <= 2000);
        assert.strictEqual(host.nextDueAt(), 2100);
    });

    it('caps a very slow speed at the longest timer delay', () => {
        const { host, sequencer, blocks } = setup();
        sequencer.submit('speed', '3000000');
        assert.strictEqual(sequencer.snapshot().config.periodMs, MAX_PERIOD_MS);

        sequencer.submit('start');
        host.advance(0);
        host.advance(1000);

        assert.strictEqual(blocks.length, 1);
        assert.strictEqual(host.nextDueAt(), MAX_PERIOD_MS);
    });

    it('resets speed to the floor without an argument', () => {
        const { sequencer } = setup();
        const status = sequencer.submit('speed');

        assert.strictEqual(status.message, 'Period set to 0.2s.');
        assert.strictEqual(sequencer.snapshot().config.periodMs, 200);
    });

    it('reports a non-numeric max as a syntax error and keeps the old ceiling', () => {
        const { sequencer } = setup();
        sequencer.submit('max', '50');

        const status = sequencer.submit('max', 'fifty');
        assert.strictEqual(status.kind, 'SyntaxError');
        assert.strictEqual(sequencer.snapshot().config.ceiling, 50n);
    });

    it('pauses and resumes without repeating or skipping terms', () => {
        const { host, sequencer, blocks } = setup();
        sequencer.submit('start');
        host.advance(0);

        assert.strictEqual(sequencer.submit('pause').message, 'Paused at (1, 2).');
        assert.strictEqual(host.pendingCount, 0);
        host.advance(3000);
        assert.strictEqual(blocks.length, 1);

        assert.strictEqual(sequencer.submit('start').message, 'Resumed at (1, 2).');
        host.advance(0);
        assert.deepStrictEqual(blocks[1].terms, [3n, 5n, 8n, 13n]);
    });

    it('emits the seed block after a pause that came before it', () => {
        const { host, sequencer, blocks } = setup();
        sequencer.submit('start');
        sequencer.submit('pause');

        assert.strictEqual(sequencer.submit('start').message, 'Resumed at (0, 1).');
        host.advance(0);
        assert.deepStrictEqual(blocks.map((b) => b.terms), [[0n, 1n, 1n, 2n]]);
    });

    it('restarts from the start terms', () => {
        const { host, sequencer, blocks } = setup();
        sequencer.submit('start', '2 3');
        host.advance(0);
        host.advance(1000);

        sequencer.submit('restart');
        host.advance(0);
        assert.deepStrictEqual(blocks.map((b) => b.terms), [
            [2n, 3n, 5n, 8n],
            [13n, 21n, 34n, 55n],
            [2n, 3n, 5n, 8n],
        ]);
    });

    it('keeps a pending tick exactly while running', () => {
        const { host, sequencer } = setup();
        const pending = () => host.pendingCount;

        sequencer.submit('start');
        assert.strictEqual(pending(), 1);
        sequencer.submit('pause');
        assert.strictEqual(pending(), 0);
        sequencer.submit('start');
        assert.strictEqual(pending(), 1);
        sequencer.submit('stop');
        assert.strictEqual(pending(), 0);
        sequencer.submit('speed', '1');
        assert.strictEqual(pending(), 0);
    });

    it('resets to the startup config', () => {
        const { sequencer } = setup();
        sequencer.submit('start', '3 4');
        sequencer.submit('speed', '3');

        assert.strictEqual(sequencer.submit('reset').message, 'Reset to (0, 1) with startup settings.');
        const state = sequencer.snapshot();
        assert.strictEqual(state.phase, 'stopped');
        assert.strictEqual(state.config.periodMs, 1000);
        assert.deepStrictEqual(state.start, { a: 0n, b: 1n });
    });

    it('notifies phase changes', () => {
        const { host, sequencer } = setup();
        const changes: PhaseChange[] = [];
        sequencer.onPhase((change) => changes.push(change));

        sequencer.submit('start');
        sequencer.submit('pause');
        sequencer.submit('max', '1');
        sequencer.submit('start');
        host.advance(0);

        assert.deepStrictEqual(changes, [
            { from: 'stopped', to: 'running' },
            { from: 'running', to: 'paused' },
            { from: 'paused', to: 'running' },
            { from: 'running', to: 'stopped' },
        ]);
    });

    it('reports the final phase when a block listener starts a new run', () => {
        const { host, sequencer, blocks } = setup();
        const changes: PhaseChange[] = [];
        sequencer.onPhase((change) => changes.push(change));
        sequencer.onBlock((block) => {
            if (!block.truncated) return;
            sequencer.submit('max');
            sequencer.submit('start');
        });

        sequencer.submit('max', '1');
        sequencer.submit('start');
        host.advance(0);

        assert.strictEqual(sequencer.phase, 'running');
        assert.deepStrictEqual(changes, [
            { from: 'stopped', to: 'running' },
            { from: 'running', to: 'stopped' },
            { from: 'stopped', to: 'running' },
        ]);
        assert.strictEqual(host.pendingCount, 1);

        host.advance(0);
        assert.deepStrictEqual(blocks.map((b) => b.terms), [
            [0n, 1n, 1n],
            [0n, 1n, 1n, 2n],
        ]);
    });

    it('rejects unknown commands', () => {
        const { sequencer } = setup();
        const status = sequencer.submit('jump');

        assert.strictEqual(status.kind, 'SyntaxError');
        assert.strictEqual(status.message, 'Unknown command: "jump".');
    });

    it('answers help with the verbs for the phase', () => {
        const { sequencer } = setup();
        sequencer.submit('start');

        const lines = sequencer.submit('help').message.split('\n');
        assert.strictEqual(
            lines[lines.length - 1],
            'Available now: start, pause, restart, stop, speed, max, reset, help, exit'
        );
    });

    describe('exit', () => {
        it('cancels the tick and refuses further commands', async () => {
            const { host, sequencer } = setup();
            sequencer.submit('start');

            assert.strictEqual(sequencer.submit('exit').message, 'Goodbye.');
            await sequencer.close();
            assert.strictEqual(sequencer.phase, 'exited');
            assert.strictEqual(host.pendingCount, 0);

            const status = sequencer.submit('start');
            assert.strictEqual(status.kind, 'IllegalTransition');
            assert.strictEqual(status.message, 'Sequencer has exited.');
        });

        it('can be requested from inside a block listener', async () => {
            const { host, sequencer, blocks } = setup();
            sequencer.onBlock(() => {
                sequencer.submit('exit');
            });
            sequencer.submit('start');

            host.advance(0);
            await sequencer.close();
            host.advance(5000);

            assert.strictEqual(sequencer.phase, 'exited');
            assert.strictEqual(blocks.length, 1);
            assert.strictEqual(host.pendingCount, 0);
        });

        it('close exits a running sequencer', async () => {
            const { host, sequencer } = setup();
            sequencer.submit('start');

            await sequencer.close();
            assert.strictEqual(sequencer.phase, 'exited');
            assert.strictEqual(host.pendingCount, 0);
        });
    });
});
