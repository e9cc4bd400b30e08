/**
 * Count conservation checks.
 *
 * Every individual declared at sort level must reach the reconciled table
 * exactly once, and every reconciled individual must reach the count table.
 */

import { groupBy, sumBy } from '../../utils/tableOps';
import type { CountRow, IntegrityReport, ReconciledIndividual, SubsampleMismatch } from './types';
import type { SortedSubsample } from './identificationMerger';

export function checkCountConservation(
    subsamples: readonly SortedSubsample[],
    reconciled: readonly ReconciledIndividual[],
    counts: readonly CountRow[]
): IntegrityReport {
    const reconciledBySubsample = groupBy(reconciled, r => r.subsampleID);
    const declaredBySubsample = groupBy(subsamples, s => s.sort.subsampleID);

    const subsampleMismatches: SubsampleMismatch[] = [];
    for (const [subsampleID, group] of declaredBySubsample) {
        const declared = sumBy(group, s => s.sort.individualCount);
        const reconciledCount = sumBy(reconciledBySubsample.get(subsampleID) ?? [], r => r.individualCount);
        if (declared !== reconciledCount) {
            subsampleMismatches.push({ subsampleID, declared, reconciled: reconciledCount });
        }
    }

    const declaredTotal = sumBy(subsamples, s => s.sort.individualCount);
    const reconciledTotal = sumBy(reconciled, r => r.individualCount);
    const countedTotal = sumBy(counts, c => c.count);

    return {
        ok: subsampleMismatches.length === 0 && declaredTotal === reconciledTotal && reconciledTotal === countedTotal,
        declaredTotal,
        reconciledTotal,
        countedTotal,
        subsampleMismatches,
    };
}
