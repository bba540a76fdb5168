import { SatStatus } from '../engines/interface.js';
import { FuzzResult } from './driver.js';

export interface CampaignSummary {
    total: number;
    byStatus: Record<SatStatus, number>;
    /** Indexes where the backend and the oracle disagreed */
    mismatches: number[];
    errors: Array<{ index: number; reason: string }>;
    timeMs: number;
}

export function summarizeCampaign(results: readonly FuzzResult[]): CampaignSummary {
    const summary: CampaignSummary = {
        total: results.length,
        byStatus: { sat: 0, unsat: 0, unknown: 0, error: 0 },
        mismatches: [],
        errors: [],
        timeMs: 0,
    };

    for (const result of results) {
        summary.byStatus[result.outcome.status]++;
        summary.timeMs += result.timeMs;
        if (result.verdict === 'mismatch') {
            summary.mismatches.push(result.index);
        }
        if (result.outcome.status === 'error') {
            summary.errors.push({ index: result.index, reason: result.outcome.reason });
        }
    }

    return summary;
}
