import { describe, test, expect } from '@jest/globals';
import { EventChannel, type EventEnvelope } from '../EventChannel';

function stopped(sessionId: string, planId: string) {
    return { type: 'plan_stopped' as const, sessionId, planId };
}

describe('EventChannel', () => {
    test('numbers events in publish order', () => {
        const channel = new EventChannel(10);
        const first = channel.publish(stopped('s1', 'p1'));
        const second = channel.publish(stopped('s1', 'p2'));
        expect([first.seq, second.seq]).toEqual([1, 2]);
        expect(Object.isFrozen(first)).toBe(true);
    });

    test('drops the oldest events when full and counts them', () => {
        const channel = new EventChannel(3);
        for (let i = 0; i < 5; i++) {
            channel.publish(stopped('s1', `p${i}`));
        }
        expect(channel.size).toBe(3);
        expect(channel.dropped).toBe(2);
        expect(channel.since(0).map((event) => event.seq)).toEqual([3, 4, 5]);
    });

    test('replays by sequence with session and type filters', () => {
        const channel = new EventChannel(10);
        channel.publish(stopped('s1', 'p1'));
        channel.publish({ type: 'persona_loaded', sessionId: 's2', persona: 'default', description: '' });
        channel.publish(stopped('s2', 'p2'));

        expect(channel.since(1, { sessionId: 's2' }).map((event) => event.seq)).toEqual([2, 3]);
        expect(channel.since(0, { types: ['plan_stopped'] }).map((event) => event.seq)).toEqual([1, 3]);
    });

    test('delivers to subscribers until they unsubscribe', () => {
        const channel = new EventChannel(10);
        const seen: EventEnvelope[] = [];
        const unsubscribe = channel.subscribe((event) => seen.push(event), { sessionId: 's1' });

        channel.publish(stopped('s1', 'p1'));
        channel.publish(stopped('s2', 'p2'));
        unsubscribe();
        channel.publish(stopped('s1', 'p3'));

        expect(seen.map((event) => event.sessionId === 's1' && event.type === 'plan_stopped' && event.planId)).toEqual([
            'p1',
        ]);
    });

    test('keeps delivering when a listener throws', () => {
        const channel = new EventChannel(10);
        let delivered = 0;
        channel.subscribe(() => {
            throw new Error('listener bug');
        });
        channel.subscribe(() => {
            delivered++;
        });

        channel.publish(stopped('s1', 'p1'));
        expect(delivered).toBe(1);
    });
});
