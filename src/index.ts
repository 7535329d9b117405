export * from './engine/battle/types'
export { computeDamage, rollDamage, fleeChance, type DamageRoll } from './engine/battle/rules'
export { typeEffectiveness, typeMatchups, type TypeMatchup } from './engine/battle/typeChart'
export { orderActions, orderKey } from './engine/battle/order'
export { executeAction, basicAttack, BASIC_ATTACK_ID } from './engine/battle/actions'
export { resolveTurn, playTurn, turnSteps, checkOutcome, BattleMachine, type BattleMachineOptions } from './engine/battle/machine'
export { decideEnemyAction, affordableSkills, ENEMY_RULES, type DecisionRule, type DecisionInput } from './engine/battle/ai'
export { attack, useSkill, defend, flee, capture } from './engine/battle/choices'
export { createBattle, recordEvent } from './engine/battle/state'
export { BattleSetupError } from './engine/battle/errors'
export { rateCaptureResolver } from './engine/battle/capture'
export { mathRandom, seededRandom } from './engine/battle/rng'
export { immediatePacer, timerPacer, type Pacer, type PauseReason } from './engine/battle/pacing'
export { createContext } from './engine/battle/context'
export { CONFIG, setConfig, resetConfig, importConfig, exportConfig, subscribe } from './config/store'
export { Skills, skillCatalog } from './content/registry'
export type { GameConfig, SkillDef, Balance, AiTuning, Pacing } from './config/schema'
export type { MonsterInput } from './content/validate'
