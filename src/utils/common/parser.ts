import HASH_CONSTANTS from '@/constants/hashConstants';
import {
  annealingConfigSchema,
  energyModeSchema,
  hashVariantSchema,
  shiftStateSchema,
  tableSizeSchema,
  type AnnealingConfig,
  type ShiftState,
} from '@/types/types';
import { InvalidConfigurationError } from '@/utils/common/errors';
import { z } from 'zod';

const describeIssues = (error: z.ZodError) =>
  error.issues
    .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');

/**
 * @notice Parses a value with a schema, converting validation failures
 * @throws InvalidConfigurationError naming the variable and the failed checks
 */
function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown, name: string): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidConfigurationError(`${name} (${describeIssues(result.error)})`);
  }
  return result.data;
}

/**
 * @notice Helper function to parse and validate environment variables
 * @param varValue The value of the environment variable, which may be undefined
 * @returns The validated environment variable value
 * @throws InvalidConfigurationError if the environment variable is undefined or empty
 */
export function parseEnvVar(varValue?: string, name?: string): string {
  if (!varValue) {
    throw new InvalidConfigurationError(`missing environment variable ${name}`);
  }
  return varValue;
}

/**
 * @notice Parses an integer environment value, falling back to a default when unset
 */
export function parseInteger(value: string | undefined, fallback: number, name: string) {
  if (value === undefined || value.trim() === '') return fallback;
  return parseWith(z.coerce.number().int(), value.trim(), name);
}

/**
 * @notice Parses a non-negative number, falling back to a default when unset
 */
export function parseNonNegativeNumber(value: string | undefined, fallback: number, name: string) {
  if (value === undefined || value.trim() === '') return fallback;
  return parseWith(z.coerce.number().finite().nonnegative(), value.trim(), name);
}

/**
 * @notice Parses a comma-separated list of power-of-two table sizes
 * @returns Sizes in the given order, or [DEFAULT_TABLE_SIZE] when unset
 */
export function parseTableSizes(value?: string) {
  if (!value) return [HASH_CONSTANTS.DEFAULT_TABLE_SIZE];
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
    .map(entry => parseWith(tableSizeSchema, Number(entry), `TABLE_SIZES entry ${entry}`));
}

/**
 * @notice Parses an `a:b:c:d` shift state
 * @dev Returns the reference state when unset
 */
export function parseShiftState(value?: string): ShiftState {
  if (!value) return { ...HASH_CONSTANTS.REFERENCE_STATE };
  const parts = value.split(':').map(part => part.trim());
  if (parts.length !== 4) {
    throw new InvalidConfigurationError(`shift state "${value}" must have the form a:b:c:d`);
  }
  const [a, b, c, d] = parts.map(Number);
  return parseWith(shiftStateSchema, { a, b, c, d }, `shift state ${value}`);
}

/**
 * @notice Parses the base hash variant, case-insensitively
 */
export function parseHashVariant(value?: string) {
  return parseWith(hashVariantSchema, (value ?? 'polynomial').toLowerCase(), 'HASH_VARIANT');
}

/**
 * @notice Parses the energy aggregation mode, case-insensitively
 */
export function parseEnergyMode(value?: string) {
  return parseWith(energyModeSchema, (value ?? 'sum').toLowerCase(), 'ENERGY_MODE');
}

/**
 * @notice Parses a boolean flag, only "true" (any case) is true
 */
export function parseFlag(value?: string) {
  return value?.trim().toLowerCase() === 'true';
}

/**
 * @notice Validates the configuration of one annealing run before it starts
 * @throws InvalidConfigurationError on a non-power-of-two size, a negative or fractional kmax,
 * a negative emax or a seed state outside [0, 31]
 */
export function validateAnnealingConfig(config: AnnealingConfig): AnnealingConfig {
  return parseWith(annealingConfigSchema, config, 'annealing run');
}

/**
 * @notice Validates a shift state supplied by a caller
 * @throws InvalidConfigurationError if any shift is not an integer in [0, 31]
 */
export function validateShiftState(state: ShiftState, name: string): ShiftState {
  return parseWith(shiftStateSchema, state, name);
}
