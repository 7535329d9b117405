import type { Action, Skill, SlotRef } from './types'

type Options = { priority?: number; target?: number }

export function attack(actor: SlotRef, options: Options = {}): Action {
  return { kind: 'attack', actor, priority: options.priority ?? 0, target: options.target }
}

/** Inherits the skill's priority tier unless one is given. */
export function useSkill(actor: SlotRef, skill: Pick<Skill, 'id' | 'priority'>, options: Options = {}): Action {
  return {
    kind: 'skill',
    actor,
    skillId: skill.id,
    priority: options.priority ?? skill.priority,
    target: options.target,
  }
}

export function defend(actor: SlotRef, options: Pick<Options, 'priority'> = {}): Action {
  return { kind: 'defend', actor, priority: options.priority ?? 0 }
}

export function flee(actor: SlotRef, options: Pick<Options, 'priority'> = {}): Action {
  return { kind: 'flee', actor, priority: options.priority ?? 0 }
}

export function capture(actor: SlotRef, itemId: string, options: Options = {}): Action {
  return { kind: 'capture', actor, itemId, priority: options.priority ?? 0, target: options.target }
}
