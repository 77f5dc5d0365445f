/**
 * State Types for labforge
 *
 * The hint file remembers what the last run did. It is never consulted
 * for provisioning decisions; live host state always wins.
 */

/**
 * Keys recorded in the hint file
 */
export type HintKey = 'lastIdentifier' | 'lastName' | 'lastOs' | 'lastStorage' | 'lastAddress';

/**
 * Root structure persisted as labforge.state.json
 */
export interface HintFile {
  /** Schema version for migrations */
  version: 1;
  /** ISO timestamp of last modification */
  updatedAt: string;
  /** Flat key/value hints */
  values: Partial<Record<HintKey, string>>;
}
