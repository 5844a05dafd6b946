import type { Candle, EnvConfig, SyncPair } from '@candle-sync/schemas';
import type { StalenessResult } from './staleness/types';
import type { Deadzone } from './backfill/types';

export type MismatchResolution = 'keep-stored' | 'keep-provider';

export interface BoundaryMismatch {
  pair: SyncPair;
  timestamp: number;
  stored: Candle;
  provider: Candle;
  threshold: number;
}

/** Decides which side wins when the boundary candle disagrees */
export type MismatchPolicy = (mismatch: BoundaryMismatch) => MismatchResolution | Promise<MismatchResolution>;

/** Decides whether a detected 1m deadzone is filled from the secondary store */
export type GapFillPolicy = (pair: SyncPair, deadzone: Deadzone) => boolean | Promise<boolean>;

/** Decides whether a pair that is not up to date gets synced */
export type UpdatePolicy = (pair: SyncPair, staleness: StalenessResult | null) => boolean | Promise<boolean>;

export const preferProvider: MismatchPolicy = () => 'keep-provider';
export const preferStored: MismatchPolicy = () => 'keep-stored';

export const alwaysFill: GapFillPolicy = () => true;
export const neverFill: GapFillPolicy = () => false;

export const alwaysUpdate: UpdatePolicy = () => true;

export interface SyncPolicies {
  update: UpdatePolicy;
  mismatch: MismatchPolicy;
  gapFill: GapFillPolicy;
}

export const DEFAULT_SYNC_POLICIES: SyncPolicies = {
  update: alwaysUpdate,
  mismatch: preferProvider,
  gapFill: alwaysFill,
};

/**
 * Policies selected by SYNC_MISMATCH_POLICY and SYNC_GAP_FILL
 */
export function policiesFromEnv(config: Pick<EnvConfig, 'SYNC_MISMATCH_POLICY' | 'SYNC_GAP_FILL'>): SyncPolicies {
  return {
    update: alwaysUpdate,
    mismatch: config.SYNC_MISMATCH_POLICY === 'keep-stored' ? preferStored : preferProvider,
    gapFill: config.SYNC_GAP_FILL ? alwaysFill : neverFill,
  };
}
