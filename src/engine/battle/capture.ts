import { CONFIG } from '@config/store'

import { clamp } from './rules'
import type { CaptureResolver, Monster } from './types'

const MAX_CAPTURE_RATE = 255

/**
 * Default resolver: the species capture rate scaled by the item's bonus, easier
 * the more HP the target has lost. Unknown items never catch anything.
 */
export const rateCaptureResolver: CaptureResolver = {
  probability(target: Monster, itemId: string): number {
    const { balance } = CONFIG()
    const bonus = balance.CAPTURE_ITEMS[itemId]
    if (bonus === undefined) {
      return 0
    }
    const hpRatio = target.stats.maxHp > 0 ? target.hp / target.stats.maxHp : 0
    const rate = (target.captureRate / MAX_CAPTURE_RATE) * bonus * (1 - balance.CAPTURE_HP_WEIGHT * hpRatio)
    return clamp(rate, 0, 1)
  },
}
