import { CONFIG } from '@config/store'

import { clamp, fleeChance, guardedDamage, healAmount, rollDamage } from './rules'
import { recordEvent } from './state'
import {
  activeRef,
  monsterAt,
  opposing,
  replaceMonster,
  resolveSkillTargets,
  sameSlot,
} from './targeting'
import type { Action, BattleContext, BattleState, Monster, Skill, SlotRef, StepResult } from './types'

export const BASIC_ATTACK_ID = 'basic_attack'

export function basicAttack(): Skill {
  const { power, accuracy } = CONFIG().balance.BASIC_ATTACK
  return {
    id: BASIC_ATTACK_ID,
    name: 'Attack',
    description: 'Basic physical attack',
    category: 'physical',
    target: 'single_enemy',
    mpCost: 0,
    power,
    accuracy,
    priority: 0,
  }
}

/**
 * Applies a single action. Infeasible actions return the input state untouched,
 * with no event unless the battle rules forbid the action outright.
 */
export function executeAction(state: BattleState, action: Action, ctx: BattleContext): StepResult {
  const actor = monsterAt(state, action.actor)
  if (!actor) {
    return skip(state, action.actor, ctx, 'no combatant in that slot')
  }
  if (actor.hp <= 0) {
    return skip(state, action.actor, ctx, `${actor.name} has fainted`)
  }

  switch (action.kind) {
    case 'attack':
      return performSkill(state, action.actor, actor, basicAttack(), action.target, ctx)
    case 'skill': {
      const skill = ctx.skills.lookup(action.skillId)
      if (!skill) {
        return skip(state, action.actor, ctx, `unknown skill ${action.skillId}`)
      }
      if (actor.mp < skill.mpCost) {
        return skip(state, action.actor, ctx, `not enough MP for ${skill.name} (need ${skill.mpCost}, have ${actor.mp})`)
      }
      return performSkill(state, action.actor, actor, skill, action.target, ctx)
    }
    case 'defend':
      return performDefend(state, action.actor, actor)
    case 'flee':
      return performFlee(state, action.actor, actor, ctx)
    case 'capture':
      return performCapture(state, action.actor, action.itemId, action.target, ctx)
  }
}

function skip(state: BattleState, actorRef: SlotRef, ctx: BattleContext, reason: string): StepResult {
  ctx.logger.debug(`[battle] ${actorRef.side}#${actorRef.slot} skipped: ${reason}`)
  return { state }
}

function isDamaging(skill: Skill): boolean {
  return (skill.category === 'physical' || skill.category === 'magical') && skill.power > 0
}

function performSkill(
  state: BattleState,
  actorRef: SlotRef,
  actor: Monster,
  skill: Skill,
  explicitTarget: number | undefined,
  ctx: BattleContext,
): StepResult {
  const targets = resolveSkillTargets(state, actorRef, skill, explicitTarget)
  if (!targets) {
    return skip(state, actorRef, ctx, `no valid target for ${skill.name}`)
  }

  let next = state
  const parts: string[] = [`${actor.name} used ${skill.name}!`]

  if (isDamaging(skill)) {
    for (const ref of targets) {
      const target = monsterAt(next, ref)
      if (!target) continue
      const roll = rollDamage(actor, target, skill, skill.category === 'physical', ctx.random)
      const dealt = isGuarded(next, ref) ? guardedDamage(roll.damage) : roll.damage
      const hp = clamp(target.hp - dealt, 0, target.stats.maxHp)
      next = replaceMonster(next, ref, { ...target, hp })

      let entry = `Dealt ${dealt} damage to ${target.name}!`
      if (roll.critical) entry += ' A critical hit!'
      if (roll.typeModifier > 1) entry += " It's super effective!"
      if (roll.typeModifier < 1) entry += " It's not very effective..."
      if (hp <= 0) entry += ` ${target.name} fainted!`
      parts.push(entry)
    }
  } else if (skill.category === 'healing' && skill.power > 0) {
    const amount = healAmount(actor, skill)
    for (const ref of targets) {
      const target = monsterAt(next, ref)
      if (!target) continue
      const hp = clamp(target.hp + amount, 0, target.stats.maxHp)
      next = replaceMonster(next, ref, { ...target, hp })
      parts.push(`Restored ${hp - target.hp} HP to ${target.name}!`)
    }
  }

  const payer = monsterAt(next, actorRef)
  if (payer && skill.mpCost > 0) {
    const mp = clamp(payer.mp - skill.mpCost, 0, payer.stats.maxMp)
    next = replaceMonster(next, actorRef, { ...payer, mp })
  }

  return withEvent(next, parts.join(' '))
}

function isGuarded(state: BattleState, ref: SlotRef): boolean {
  return state.guards.some((guard) => sameSlot(guard, ref))
}

function performDefend(state: BattleState, actorRef: SlotRef, actor: Monster): StepResult {
  const guards = isGuarded(state, actorRef) ? state.guards : [...state.guards, actorRef]
  return withEvent({ ...state, guards }, `${actor.name} is defending and takes a defensive stance!`)
}

function performFlee(state: BattleState, actorRef: SlotRef, actor: Monster, ctx: BattleContext): StepResult {
  if (!state.canFlee) {
    return withEvent(state, "Can't escape from this battle!")
  }
  const foe = monsterAt(state, activeRef(state, opposing(actorRef.side)))
  const chance = fleeChance(actor.stats.agility, foe?.stats.agility ?? 0)
  if (ctx.random() < chance) {
    return withEvent({ ...state, phase: 'escaped' }, `${actor.name} got away safely!`)
  }
  return withEvent(state, `${actor.name} couldn't get away!`)
}

function performCapture(
  state: BattleState,
  actorRef: SlotRef,
  itemId: string,
  explicitTarget: number | undefined,
  ctx: BattleContext,
): StepResult {
  const targetRef: SlotRef = explicitTarget === undefined
    ? activeRef(state, opposing(actorRef.side))
    : { side: opposing(actorRef.side), slot: explicitTarget }
  const target = monsterAt(state, targetRef)
  if (!target || target.hp <= 0) {
    return skip(state, actorRef, ctx, `no capturable target for ${itemId}`)
  }
  if (actorRef.side !== 'player' || !state.isWildEncounter || !state.canCapture) {
    return withEvent(state, `${target.name} can't be captured!`)
  }

  const raw = ctx.capture.probability(target, itemId)
  const chance = clamp(raw, 0, 1)
  if (chance !== raw) {
    ctx.logger.warn(`[battle] capture probability ${raw} for ${itemId} clamped to ${chance}`)
  }
  if (ctx.random() < chance) {
    return withEvent(
      { ...state, phase: 'captured', captured: targetRef.slot },
      `Gotcha! ${target.name} was captured!`,
    )
  }
  return withEvent(state, `${target.name} broke free!`)
}

function withEvent(state: BattleState, event: string): StepResult {
  return { state: recordEvent(state, event), event }
}
