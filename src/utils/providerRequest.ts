import { Logger } from '@nestjs/common';
import { clip } from './textNormalizer';
import { FailureReason, ServiceResult, failure, success } from './types';

export type QueryParams = Record<string, string | number | undefined>;

export interface ProviderRequestOptions {
    service: string;
    baseUrl: string;
    timeoutMs: number;
    /** Query parameters holding credentials; masked before a URL is logged. */
    secretParams?: string[];
}

export function reasonForStatus(status: number): FailureReason {
    if (status === 401 || status === 403) return FailureReason.InvalidKey;
    if (status === 400 || status === 404) return FailureReason.NotFound;
    if (status === 429) return FailureReason.RateLimited;
    return FailureReason.Unreachable;
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.name === 'TimeoutError' ? 'request timed out' : error.message;
    }
    return String(error);
}

/**
 * Single-shot JSON GET against one external data provider. Every outcome,
 * including network errors and timeouts, comes back as a ServiceResult.
 */
export class ProviderRequest {
    private readonly logger: Logger;

    constructor(private readonly options: ProviderRequestOptions) {
        this.logger = new Logger(`ProviderRequest:${options.service}`);
    }

    buildUrl(path: string, params: QueryParams): URL {
        const url = new URL(`${this.options.baseUrl}${path}`);
        for (const [key, value] of Object.entries(params)) {
            if (value !== undefined && value !== '') {
                url.searchParams.set(key, String(value));
            }
        }
        return url;
    }

    async getJson(path: string, params: QueryParams = {}): Promise<ServiceResult<unknown>> {
        const url = this.buildUrl(path, params);
        const printable = this.redact(url);

        let resp: Response;
        try {
            resp = await fetch(url, {
                headers: { 'Accept': 'application/json', 'User-Agent': 'voice-info-bot/0.1' },
                signal: AbortSignal.timeout(this.options.timeoutMs),
            });
        } catch (error) {
            const detail = describeError(error);
            this.logger.warn(`GET ${printable} failed: ${detail}`);
            return failure(FailureReason.Unreachable, detail);
        }

        if (!resp.ok) {
            const text = await resp.text().catch(() => '');
            const reason = reasonForStatus(resp.status);
            this.logger.warn(`GET ${printable} -> ${resp.status} (${reason})`);
            return failure(reason, `${resp.status} ${clip(text, 200)}`.trim());
        }

        try {
            const body: unknown = await resp.json();
            this.logger.log(`GET ${printable} -> ${resp.status}`);
            return success(body);
        } catch (error) {
            this.logger.warn(`GET ${printable} returned malformed JSON: ${describeError(error)}`);
            return failure(FailureReason.Unreachable, 'malformed JSON response');
        }
    }

    private redact(url: URL): string {
        const copy = new URL(url.toString());
        for (const key of this.options.secretParams ?? []) {
            if (copy.searchParams.has(key)) {
                copy.searchParams.set(key, '***');
            }
        }
        return copy.toString();
    }
}
