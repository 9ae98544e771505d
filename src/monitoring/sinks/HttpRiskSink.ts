import { z } from 'zod';
import type { RiskReport, SinkResult } from '../types/RiskReport.js';
import type { RiskReportSink } from './RiskSink.js';
import { toRiskReportPayload } from '../wire.js';
import { CircuitBreaker, type CircuitBreakerConfig, type CircuitBreakerState } from '../ErrorHandler.js';
import { silentLogger, type MonitoringLogger } from '../../utils/logger/structuredLogger.js';

export interface HttpRiskSinkOptions {
    /** Collector base URL, e.g. http://127.0.0.1:8000 */
    baseUrl: string;
    /** Abort a request after this many milliseconds */
    timeoutMs?: number;
    fetchImpl?: typeof fetch;
    circuitBreaker?: Partial<CircuitBreakerConfig>;
    logger?: MonitoringLogger;
}

const collectorResponseSchema = z.object({
    record_id: z.number().optional(),
    detail: z.unknown().optional(),
    error: z.string().optional(),
});

type CollectorResponse = z.infer<typeof collectorResponseSchema>;

/**
 * Posts risk reports to the collector's `/risk` endpoint
 */
export class HttpRiskSink implements RiskReportSink {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: typeof fetch;
    private readonly breaker: CircuitBreaker;
    private readonly logger: MonitoringLogger;

    constructor(options: HttpRiskSinkOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs ?? 2000;
        this.fetchImpl = options.fetchImpl ?? fetch;
        this.breaker = new CircuitBreaker({
            failureThreshold: 3,
            recoveryTimeout: 30000, // 30 seconds
            minimumRequests: 3,
            ...options.circuitBreaker,
        });
        this.logger = options.logger ?? silentLogger;
    }

    async send(report: RiskReport): Promise<SinkResult> {
        if (!this.breaker.allowRequest()) {
            return { status: 'failed', error: 'Circuit breaker open' };
        }
        this.breaker.recordRequest();

        try {
            const response = await this.request(`${this.baseUrl}/risk`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(toRiskReportPayload(report)),
            });
            const body = await readBody(response);

            if (response.ok) {
                this.breaker.onSuccess();
                return { status: 'accepted', recordId: body.record_id };
            }

            if (response.status === 400 || response.status === 422) {
                // The collector answered; only the report was bad
                this.breaker.onSuccess();
                return { status: 'rejected', reason: rejectionReason(body, response.status) };
            }

            this.breaker.onFailure();
            return { status: 'failed', error: `HTTP ${response.status}` };
        } catch (error) {
            this.breaker.onFailure();
            const message = isAbortError(error)
                ? `Request timed out after ${this.timeoutMs}ms`
                : error instanceof Error ? error.message : String(error);
            this.logger.debug('risk_sink_request_failed', { message });
            return { status: 'failed', error: message };
        }
    }

    /**
     * Whether the collector answers its health endpoint
     */
    async health(): Promise<boolean> {
        try {
            const response = await this.request(`${this.baseUrl}/api/health`, { method: 'GET' });
            return response.ok;
        } catch {
            return false;
        }
    }

    /**
     * Poll the health endpoint until it answers, up to `attempts` times
     */
    async waitUntilHealthy(attempts: number = 5, delayMs: number = 1000): Promise<boolean> {
        for (let attempt = 1; attempt <= attempts; attempt++) {
            if (await this.health()) {
                this.logger.info('collector_reachable', { attempt });
                return true;
            }
            if (attempt < attempts) {
                await new Promise(resolve => setTimeout(resolve, delayMs));
            }
        }
        this.logger.warn('collector_unreachable', { attempts, baseUrl: this.baseUrl });
        return false;
    }

    get circuitState(): CircuitBreakerState {
        return this.breaker.getState();
    }

    private async request(url: string, init: RequestInit): Promise<Response> {
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.timeoutMs);
        try {
            return await this.fetchImpl(url, { ...init, signal: controller.signal });
        } finally {
            clearTimeout(timer);
        }
    }
}

async function readBody(response: Response): Promise<CollectorResponse> {
    let raw: unknown;
    try {
        raw = JSON.parse(await response.text());
    } catch {
        return {};
    }
    const parsed = collectorResponseSchema.safeParse(raw);
    return parsed.success ? parsed.data : {};
}

function rejectionReason(body: CollectorResponse, status: number): string {
    if (typeof body.detail === 'string') return body.detail;
    if (body.detail !== undefined) return JSON.stringify(body.detail);
    return body.error ?? `HTTP ${status}`;
}

function isAbortError(error: unknown): boolean {
    return error instanceof Error && error.name === 'AbortError';
}
