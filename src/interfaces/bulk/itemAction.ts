/**
 * ItemAction interface: the per-record mutation of a bulk run
 */

import type { ActionCallOptions, ActionOutcome, ItemIdentifier } from "@/types";

export interface ItemAction<T = unknown> {
  /**
   * Perform one remote mutation for one record
   *
   * Resolves with the parsed response on success. Rejects on failure; a
   * rejection carrying HTTP status 429 is treated as a rate-limit signal.
   */
  perform(itemId: ItemIdentifier, options: ActionCallOptions): Promise<ActionOutcome<T>>;
}
