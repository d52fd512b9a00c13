/**
 * @quorate/vote — Manual block clock.
 *
 * The host advances the height as it processes blocks. Heights never
 * move backwards.
 */

import type { BlockHeight } from "@quorate/types";
import { validateBlockHeight } from "./signal-math.js";
import type { BlockClock } from "./types.js";
import { VoteError } from "./types.js";

export class ManualBlockClock implements BlockClock {
  private _height: BlockHeight;

  constructor(start: BlockHeight = 0) {
    validateBlockHeight(start);
    this._height = start;
  }

  now(): BlockHeight {
    return this._height;
  }

  advanceTo(height: BlockHeight): void {
    validateBlockHeight(height);
    if (height < this._height) {
      throw new VoteError(
        "INVALID_BLOCK_HEIGHT",
        `Cannot move clock backwards from ${String(this._height)} to ${String(height)}`,
      );
    }
    this._height = height;
  }

  advanceBy(blocks: BlockHeight): void {
    validateBlockHeight(blocks, "Block count");
    this.advanceTo(this._height + blocks);
  }
}
