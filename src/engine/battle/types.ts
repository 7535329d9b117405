import type { BattleType, MonsterType, SkillCategory, SkillTarget } from '@config/schema'

export type { BattleType, MonsterType, SkillCategory, SkillTarget }

export type Side = 'player' | 'enemy'

export type Phase = 'selecting' | 'resolving' | 'victory' | 'defeat' | 'captured' | 'escaped'

export interface Stats {
  readonly maxHp: number; readonly maxMp: number;
  readonly attack: number; readonly defense: number; readonly agility: number;
  readonly magic: number; readonly wisdom: number;
}

export interface Monster {
  readonly id: string; readonly name: string; readonly level: number;
  readonly type1: MonsterType; readonly type2?: MonsterType;
  readonly hp: number; readonly mp: number;
  readonly stats: Stats;
  readonly skills: readonly string[];
  readonly captureRate: number;
}

export interface Skill {
  readonly id: string; readonly name: string; readonly description?: string
  readonly category: SkillCategory; readonly target: SkillTarget
  readonly mpCost: number; readonly power: number; readonly accuracy: number; readonly priority: number
}

export interface SlotRef { readonly side: Side; readonly slot: number }

interface ActionBase {
  readonly actor: SlotRef
  readonly priority: number
  /**
   * Target slot. Addresses the actor's own side for `single_ally` skills, the
   * opposing side otherwise; defaults to the actor or the opposing active slot.
   */
  readonly target?: number
}

export type Action =
  | (ActionBase & { readonly kind: 'attack' })
  | (ActionBase & { readonly kind: 'skill'; readonly skillId: string })
  | (ActionBase & { readonly kind: 'defend' })
  | (ActionBase & { readonly kind: 'flee' })
  | (ActionBase & { readonly kind: 'capture'; readonly itemId: string })

export type ActionKind = Action['kind']

export interface BattleState {
  readonly player: readonly Monster[]
  readonly enemy: readonly Monster[]
  readonly active: { readonly player: number; readonly enemy: number }
  readonly phase: Phase
  readonly turn: number
  readonly lastEvent: string
  readonly log: readonly string[]
  readonly battleType: BattleType
  readonly isWildEncounter: boolean
  readonly canFlee: boolean
  readonly canCapture: boolean
  /** Slots holding a defensive stance until the current turn ends. */
  readonly guards: readonly SlotRef[]
  readonly captured?: number
}

export interface SkillCatalog {
  lookup(skillId: string): Skill | undefined
  all(): readonly Skill[]
}

export interface CaptureResolver {
  /** Chance in [0, 1] that `itemId` catches `target`. */
  probability(target: Monster, itemId: string): number
}

export type RandomSource = () => number

export type BattleLogger = Pick<Console, 'debug' | 'warn'>

export interface BattleContext {
  skills: SkillCatalog
  capture: CaptureResolver
  random: RandomSource
  logger: BattleLogger
}

export interface StepResult { state: BattleState; event?: string }

export interface TurnResult { state: BattleState; events: string[] }

export const TERMINAL_PHASES: readonly Phase[] = ['victory', 'defeat', 'captured', 'escaped']

export function isTerminal(phase: Phase): boolean {
  return TERMINAL_PHASES.includes(phase)
}
