import fs from 'node:fs';
import { z } from 'zod';
import type { RiskReport } from '../monitoring/types/RiskReport.js';
import { fromRiskReportPayload, riskReportPayloadSchema, toRiskReportPayload } from '../monitoring/wire.js';
import { ensureDirExistence } from '../utils/ensureDirExistence.js';
import { silentLogger, type MonitoringLogger } from '../utils/logger/structuredLogger.js';

/**
 * A validated, stored report
 */
export interface RiskRecord extends RiskReport {
    id: number;
    validated: true;
    /** ISO timestamp of storage */
    createdAt: string;
}

export const riskRecordPayloadSchema = riskReportPayloadSchema.extend({
    id: z.number().int().positive(),
    validated: z.literal(true),
    created_at: z.string(),
});

export type RiskRecordPayload = z.infer<typeof riskRecordPayloadSchema>;

export function toRiskRecordPayload(record: RiskRecord): RiskRecordPayload {
    return {
        id: record.id,
        ...toRiskReportPayload(record),
        validated: true,
        created_at: record.createdAt,
    };
}

export interface RiskRecordStoreOptions {
    /** JSON-lines file the records are appended to and reloaded from */
    filePath?: string;
    logger?: MonitoringLogger;
    now?: () => Date;
}

/**
 * Append-only record store with auto-increment ids, optionally persisted
 * as one JSON object per line
 */
export class RiskRecordStore {
    private records: RiskRecord[] = [];
    private nextId = 1;
    private readonly filePath?: string;
    private readonly logger: MonitoringLogger;
    private readonly now: () => Date;

    constructor(options: RiskRecordStoreOptions = {}) {
        this.filePath = options.filePath;
        this.logger = options.logger ?? silentLogger;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Reload persisted records. Returns how many were loaded.
     */
    load(): number {
        if (!this.filePath || !fs.existsSync(this.filePath)) {
            return 0;
        }

        const lines = fs.readFileSync(this.filePath, 'utf-8').split('\n');
        let skipped = 0;
        for (const line of lines) {
            if (line.trim() === '') continue;

            let raw: unknown;
            try {
                raw = JSON.parse(line);
            } catch {
                skipped++;
                continue;
            }

            const parsed = riskRecordPayloadSchema.safeParse(raw);
            if (!parsed.success) {
                skipped++;
                continue;
            }

            const record: RiskRecord = {
                ...fromRiskReportPayload(parsed.data),
                id: parsed.data.id,
                validated: true,
                createdAt: parsed.data.created_at,
            };
            this.records.push(record);
            this.nextId = Math.max(this.nextId, record.id + 1);
        }

        if (skipped > 0) {
            this.logger.warn('risk_records_skipped', { skipped, filePath: this.filePath });
        }
        this.logger.info('risk_records_loaded', { count: this.records.length, filePath: this.filePath });
        return this.records.length;
    }

    /**
     * Store a validated report and return the new record
     */
    add(report: RiskReport): RiskRecord {
        const record: RiskRecord = {
            timestamp: report.timestamp,
            riskScore: report.riskScore,
            anomalyScores: { ...report.anomalyScores },
            sessionId: report.sessionId,
            source: report.source,
            id: this.nextId,
            validated: true,
            createdAt: this.now().toISOString(),
        };

        if (this.filePath) {
            ensureDirExistence(this.filePath);
            fs.appendFileSync(this.filePath, `${JSON.stringify(toRiskRecordPayload(record))}\n`);
        }

        this.nextId++;
        this.records.push(record);
        return record;
    }

    get(id: number): RiskRecord | undefined {
        return this.records.find(record => record.id === id);
    }

    /**
     * Records of one session ordered by report timestamp
     */
    getBySession(sessionId: string): RiskRecord[] {
        return this.records
            .filter(record => record.sessionId === sessionId)
            .sort((a, b) => a.timestamp - b.timestamp);
    }

    all(): readonly RiskRecord[] {
        return [...this.records];
    }

    sessionIds(): string[] {
        return [...new Set(this.records.map(record => record.sessionId))];
    }

    get size(): number {
        return this.records.length;
    }
}
