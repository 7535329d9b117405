import { skillCatalog } from '@content/registry'

import { rateCaptureResolver } from './capture'
import { mathRandom } from './rng'
import type { BattleContext } from './types'

export function createContext(overrides: Partial<BattleContext> = {}): BattleContext {
  return {
    skills: overrides.skills ?? skillCatalog,
    capture: overrides.capture ?? rateCaptureResolver,
    random: overrides.random ?? mathRandom,
    logger: overrides.logger ?? console,
  }
}
