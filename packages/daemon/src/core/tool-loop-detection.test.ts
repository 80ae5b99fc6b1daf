/**
 * Tests for Tool Loop Detection module
 */
import { describe, it, expect } from 'vitest';
import { ToolLoopDetector, hashToolCall, hashResult } from './tool-loop-detection.js';

describe('hashToolCall', () => {
    it('produces consistent hashes for same input', () => {
        expect(hashToolCall('calculator', { a: 1 })).toBe(hashToolCall('calculator', { a: 1 }));
    });

    it('produces different hashes for different input', () => {
        expect(hashToolCall('calculator', { a: 1 })).not.toBe(hashToolCall('calculator', { a: 2 }));
    });

    it('returns a 16-char hex string', () => {
        expect(hashToolCall('test', {})).toMatch(/^[0-9a-f]{16}$/);
        expect(hashResult('test')).toMatch(/^[0-9a-f]{16}$/);
    });
});

describe('ToolLoopDetector', () => {
    it('stays quiet below the repeat threshold', () => {
        const detector = new ToolLoopDetector();
        expect(detector.record('uuid', {}, 'a').stuck).toBe(false);
        expect(detector.record('uuid', {}, 'a').stuck).toBe(false);
    });

    it('warns on the third identical call with an identical result', () => {
        const detector = new ToolLoopDetector();
        detector.record('calculator', { a: 1 }, '2');
        detector.record('calculator', { a: 1 }, '2');
        const result = detector.record('calculator', { a: 1 }, '2');
        expect(result).toMatchObject({ stuck: true, detector: 'generic_repeat', count: 3 });
    });

    it('does not warn when the result changes', () => {
        const detector = new ToolLoopDetector();
        detector.record('current_time', {}, '10:00:01');
        detector.record('current_time', {}, '10:00:02');
        expect(detector.record('current_time', {}, '10:00:03').stuck).toBe(false);
    });

    it('detects ping-pong between two calls', () => {
        const detector = new ToolLoopDetector();
        detector.record('a', {}, 'x');
        detector.record('b', {}, 'y');
        detector.record('a', {}, 'x');
        const result = detector.record('b', {}, 'y');
        expect(result).toMatchObject({ stuck: true, detector: 'ping_pong', count: 4 });
    });

    it('honours a custom threshold', () => {
        const detector = new ToolLoopDetector({ repeatThreshold: 2 });
        detector.record('uuid', {}, 'a');
        expect(detector.record('uuid', {}, 'a')).toMatchObject({ stuck: true, count: 2 });
    });
});
