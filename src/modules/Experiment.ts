import HASH_CONSTANTS from '@/constants/hashConstants';
import {
  type AnnealingConfig,
  type EnergyMode,
  type HashVariant,
  type IterationSnapshot,
  type ShiftState,
  type SizeComparison,
} from '@/types/types';
import { computeSimAnnealing } from '@/utils/annealing/computeSimAnnealing';
import { InputUnavailableError } from '@/utils/common/errors';
import { formatShiftState } from '@/utils/common/formatBits';
import { getRunLog, logger } from '@/utils/common/log';
import { validateAnnealingConfig, validateShiftState } from '@/utils/common/parser';
import { createRandomSource, resolveSeed, type RandomSource } from '@/utils/common/random';
import { computeEnergy, computeFileEnergies } from '@/utils/hashing/computeEnergy';
import { hashWordFile } from '@/utils/hashing/hashWordFile';

/**
 * @title Experiment
 * @notice Runs the shift search once per table size and compares each result against the
 * reference shifts
 */
class Experiment {
  private wordsPath: string;
  private hashedPath: string;
  private hashVariant: HashVariant;
  private energyMode: EnergyMode;
  private tableSizes: number[];
  private kmax: number;
  private emax: number;
  private initialState: ShiftState;
  private referenceState: ShiftState;
  private seed: number;
  private random: RandomSource;
  private verbose: boolean;

  /**
   * @notice Creates a new Experiment instance
   * @dev A random source can be injected; otherwise one is created from `seed` or the wall clock
   */
  constructor({
    wordsPath,
    hashedPath,
    hashVariant,
    energyMode,
    tableSizes,
    kmax,
    emax,
    initialState,
    referenceState = HASH_CONSTANTS.REFERENCE_STATE,
    seed,
    random,
    verbose = false,
  }: {
    wordsPath: string;
    hashedPath: string;
    hashVariant: HashVariant;
    energyMode: EnergyMode;
    tableSizes: number[];
    kmax: number;
    emax: number;
    initialState: ShiftState;
    referenceState?: ShiftState;
    seed?: number;
    random?: RandomSource;
    verbose?: boolean;
  }) {
    this.wordsPath = wordsPath;
    this.hashedPath = hashedPath;
    this.hashVariant = hashVariant;
    this.energyMode = energyMode;
    this.tableSizes = tableSizes;
    this.kmax = kmax;
    this.emax = emax;
    this.initialState = initialState;
    this.referenceState = referenceState;
    this.seed = resolveSeed(seed);
    this.random = random ?? createRandomSource(this.seed);
    this.verbose = verbose;
  }

  private getAnnealingConfig(size: number): AnnealingConfig {
    return {
      size,
      kmax: this.kmax,
      emax: this.emax,
      initialState: this.initialState,
      energyMode: this.energyMode,
    };
  }

  private traceIteration(size: number, snapshot: IterationSnapshot) {
    logger.debug({
      msg: snapshot.accepted ? 'accepted' : 'not accepted',
      size,
      k: snapshot.k,
      temperature: snapshot.temperature,
      state: formatShiftState(snapshot.proposedState),
      energy: snapshot.proposedEnergy,
      current: snapshot.currentEnergy,
      best: snapshot.bestEnergy,
      newBest: snapshot.isNewBest,
    });
  }

  /**
   * @notice Anneals one table size and compares it with the reference energy at that size
   */
  private runSize(
    baseHashes: readonly number[],
    size: number,
    referenceEnergy: number,
  ): SizeComparison {
    const initialEnergy = computeEnergy(baseHashes, this.initialState, size, this.energyMode);

    const [bestState, bestEnergy] = computeSimAnnealing({
      baseHashes,
      config: this.getAnnealingConfig(size),
      random: this.random,
      onIteration: this.verbose ? snapshot => this.traceIteration(size, snapshot) : undefined,
    });

    const comparison: SizeComparison = {
      size,
      bestState,
      bestEnergy,
      referenceState: this.referenceState,
      referenceEnergy,
      improved: bestEnergy < referenceEnergy,
    };

    logger.info({
      msg: 'run log',
      runLog: getRunLog(
        comparison,
        { state: this.initialState, energy: initialEnergy },
        baseHashes.length,
        this.hashVariant,
        this.energyMode,
        this.seed,
        this.kmax,
        this.emax,
      ),
    });

    return comparison;
  }

  /**
   * @notice Hashes the word list once, then searches every configured table size
   * @dev The reference state and every size are validated before the word list is read.
   * Reference energies come from a single read of the hashed cache, before any search.
   * @returns One comparison per table size, in configuration order
   * @throws InputUnavailableError if the word list or the hashed cache cannot be read
   */
  public async run() {
    validateShiftState(this.referenceState, 'reference state');
    this.tableSizes.forEach(size => validateAnnealingConfig(this.getAnnealingConfig(size)));

    const baseHashes = await hashWordFile(this.wordsPath, this.hashedPath, this.hashVariant);

    const referenceEnergies = await computeFileEnergies(
      this.hashedPath,
      this.referenceState,
      this.tableSizes,
      this.energyMode,
    );
    if (referenceEnergies.some(energy => energy < 0)) {
      throw new InputUnavailableError(this.hashedPath);
    }

    return this.tableSizes.map((size, i) => this.runSize(baseHashes, size, referenceEnergies[i]));
  }
}

export default Experiment;
