import { CONFIG } from '@config/store'

import { attack, defend, useSkill } from './choices'
import { activeRef, monsterAt } from './targeting'
import type { Action, BattleContext, BattleState, Monster, Skill, SkillCatalog, SlotRef } from './types'

export interface DecisionInput {
  state: BattleState
  self: Monster
  ref: SlotRef
  ctx: BattleContext
}

/**
 * One step of the enemy heuristic. Rules are tried in order and the first whose
 * `applies` passes picks the action; `applies` may consume random draws.
 */
export interface DecisionRule {
  name: string
  applies(input: DecisionInput): boolean
  choose(input: DecisionInput): Action
}

/** Known skills narrow the pool; a monster with none draws from the whole catalog. */
export function affordableSkills(monster: Monster, catalog: SkillCatalog): Skill[] {
  const pool: readonly (Skill | undefined)[] = monster.skills.length
    ? monster.skills.map((id) => catalog.lookup(id))
    : catalog.all()
  return pool.filter((skill): skill is Skill => skill !== undefined && skill.mpCost <= monster.mp)
}

export const ENEMY_RULES: readonly DecisionRule[] = [
  {
    name: 'cast-skill',
    applies: ({ self, ctx }) => {
      const { ai } = CONFIG()
      return self.mp > ai.SKILL_MP_THRESHOLD && ctx.random() < ai.SKILL_CHANCE
    },
    choose: ({ self, ref, ctx }) => {
      const options = affordableSkills(self, ctx.skills)
      if (options.length === 0) {
        return attack(ref)
      }
      const index = Math.min(options.length - 1, Math.floor(ctx.random() * options.length))
      return useSkill(ref, options[index])
    },
  },
  {
    name: 'guard-when-low',
    applies: ({ self, ctx }) => {
      const { ai } = CONFIG()
      return self.hp < self.stats.maxHp * ai.LOW_HP_RATIO && ctx.random() < ai.DEFEND_CHANCE
    },
    choose: ({ ref }) => defend(ref),
  },
  {
    name: 'attack',
    applies: () => true,
    choose: ({ ref }) => attack(ref),
  },
]

export function decideEnemyAction(
  state: BattleState,
  ctx: BattleContext,
  rules: readonly DecisionRule[] = ENEMY_RULES,
): Action {
  const ref = activeRef(state, 'enemy')
  const self = monsterAt(state, ref)
  if (!self) {
    return attack(ref)
  }
  const input: DecisionInput = { state, self, ref, ctx }
  const rule = rules.find((candidate) => candidate.applies(input))
  return rule ? rule.choose(input) : attack(ref)
}
