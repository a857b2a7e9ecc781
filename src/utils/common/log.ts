import { type EnergyMode, type HashVariant, type RunLog, type SizeComparison } from '@/types/types';
import { formatShiftState, toUnsignedBitString } from '@/utils/common/formatBits';
import pino from 'pino';

export const logger = pino(
  process.env.NODE_ENV === 'dev'
    ? {
        transport: {
          target: 'pino-pretty',
        },
      }
    : { level: process.env.LOG_LEVEL ?? 'info' },
);

export function getRunLog(
  comparison: SizeComparison,
  initial: { state: SizeComparison['bestState']; energy: number },
  words: number,
  hashVariant: HashVariant,
  energyMode: EnergyMode,
  seed: number,
  kmax: number,
  emax: number,
): RunLog {
  return {
    words,
    hashVariant,
    energyMode,
    size: comparison.size,
    mask: toUnsignedBitString(comparison.size - 1),
    seed,
    kmax,
    emax,
    initial: {
      state: formatShiftState(initial.state),
      energy: initial.energy,
    },
    best: {
      state: formatShiftState(comparison.bestState),
      energy: comparison.bestEnergy,
    },
    reference: {
      state: formatShiftState(comparison.referenceState),
      energy: comparison.referenceEnergy,
    },
    improved: comparison.improved,
  };
}
