import Experiment from '@/modules/Experiment';
import { formatShiftState } from '@/utils/common/formatBits';
import { logger } from '@/utils/common/log';

export async function main() {
  try {
    // ENV is parsed on import, so configuration errors land in this catch
    const { default: ENV } = await import('@/constants/constants');
    if (ENV.VERBOSE) logger.level = 'debug';

    const experiment = new Experiment({
      wordsPath: ENV.WORDS_PATH,
      hashedPath: ENV.HASHED_PATH,
      hashVariant: ENV.HASH_VARIANT,
      energyMode: ENV.ENERGY_MODE,
      tableSizes: ENV.TABLE_SIZES,
      kmax: ENV.KMAX,
      emax: ENV.EMAX,
      initialState: ENV.INITIAL_STATE,
      seed: ENV.SEED,
      verbose: ENV.VERBOSE,
    });

    const comparisons = await experiment.run();
    comparisons.forEach(comparison => {
      logger.info({
        msg: comparison.improved ? 'beat reference shifts' : 'reference shifts not beaten',
        size: comparison.size,
        best: `${formatShiftState(comparison.bestState)} => ${comparison.bestEnergy}`,
        reference: `${formatShiftState(comparison.referenceState)} => ${comparison.referenceEnergy}`,
      });
    });
  } catch (error) {
    logger.error(error);
    process.exitCode = 1;
  }
}

if (require.main === module) main();
