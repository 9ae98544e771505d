import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { RiskRecordStore } from '../src/collector/RiskRecordStore.js';
import type { RiskReport } from '../src/monitoring/types/RiskReport.js';

const fixedNow = () => new Date('2026-01-01T00:00:00.000Z');

function report(sessionId: string, timestamp: number, riskScore = 25): RiskReport {
    return {
        timestamp,
        riskScore,
        anomalyScores: { idleBurst: 0, focusInstability: 0, behavioralDrift: 70, overall: 70 },
        sessionId,
        source: 'test-client',
    };
}

describe('RiskRecordStore', () => {
    let tempDir: string;
    let filePath: string;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pacewatch-store-'));
        filePath = path.join(tempDir, 'nested', 'risk_records.jsonl');
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should assign increasing ids and a creation time', () => {
        const store = new RiskRecordStore({ now: fixedNow });

        const first = store.add(report('a', 10));
        const second = store.add(report('a', 20));

        expect(first.id).toBe(1);
        expect(second.id).toBe(2);
        expect(first.createdAt).toBe('2026-01-01T00:00:00.000Z');
        expect(first.validated).toBe(true);
        expect(store.get(2)).toEqual(second);
        expect(store.size).toBe(2);
    });

    it('should return session records ordered by timestamp', () => {
        const store = new RiskRecordStore();
        store.add(report('a', 30));
        store.add(report('b', 5));
        store.add(report('a', 10));

        expect(store.getBySession('a').map(r => r.timestamp)).toEqual([10, 30]);
        expect(store.sessionIds()).toEqual(['a', 'b']);
        expect(store.getBySession('missing')).toEqual([]);
    });

    it('should append one JSON line per record', () => {
        const store = new RiskRecordStore({ filePath, now: fixedNow });

        store.add(report('a', 10));

        expect(fs.readFileSync(filePath, 'utf-8')).toBe(
            '{"id":1,"timestamp":10,"risk_score":25,' +
                '"anomaly_scores":{"idle_burst":0,"focus_instability":0,"behavioral_drift":70,"overall":70},' +
                '"session_id":"a","source":"test-client","validated":true,"created_at":"2026-01-01T00:00:00.000Z"}\n'
        );
    });

    it('should reload persisted records and continue the id sequence', () => {
        const writer = new RiskRecordStore({ filePath });
        writer.add(report('a', 10));
        writer.add(report('b', 20, 80));

        const reader = new RiskRecordStore({ filePath });
        expect(reader.load()).toBe(2);
        expect(reader.get(2)?.riskScore).toBe(80);

        expect(reader.add(report('a', 30)).id).toBe(3);
    });

    it('should skip malformed lines when loading', () => {
        const writer = new RiskRecordStore({ filePath });
        writer.add(report('a', 10));
        fs.appendFileSync(filePath, 'not json\n{"id":5}\n\n');

        const reader = new RiskRecordStore({ filePath });

        expect(reader.load()).toBe(1);
    });

    it('should load nothing when the file does not exist', () => {
        const store = new RiskRecordStore({ filePath });

        expect(store.load()).toBe(0);
        expect(store.size).toBe(0);
    });
});
