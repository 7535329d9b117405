import type { BattleState, Monster, Side, Skill, SlotRef } from './types'

export function opposing(side: Side): Side {
  return side === 'player' ? 'enemy' : 'player'
}

export function party(state: BattleState, side: Side): readonly Monster[] {
  return side === 'player' ? state.player : state.enemy
}

export function monsterAt(state: BattleState, ref: SlotRef): Monster | undefined {
  const members = party(state, ref.side)
  if (!Number.isInteger(ref.slot) || ref.slot < 0 || ref.slot >= members.length) {
    return undefined
  }
  return members[ref.slot]
}

export function activeRef(state: BattleState, side: Side): SlotRef {
  return { side, slot: state.active[side] }
}

export function sameSlot(a: SlotRef, b: SlotRef): boolean {
  return a.side === b.side && a.slot === b.slot
}

export function replaceMonster(state: BattleState, ref: SlotRef, monster: Monster): BattleState {
  const members = party(state, ref.side).slice()
  members[ref.slot] = monster
  return ref.side === 'player' ? { ...state, player: members } : { ...state, enemy: members }
}

export function isSideDown(state: BattleState, side: Side): boolean {
  return party(state, side).every((monster) => monster.hp <= 0)
}

function livingRefs(state: BattleState, side: Side): SlotRef[] {
  const refs: SlotRef[] = []
  party(state, side).forEach((monster, slot) => {
    if (monster.hp > 0) {
      refs.push({ side, slot })
    }
  })
  return refs
}

/**
 * Resolves who a skill lands on. An explicit slot addresses the actor's own side
 * for `single_ally` skills and the opposing side otherwise. Returns `undefined`
 * when that slot is out of range or already fainted.
 */
export function resolveSkillTargets(
  state: BattleState,
  actor: SlotRef,
  skill: Skill,
  explicitTarget?: number,
): SlotRef[] | undefined {
  const foe = opposing(actor.side)

  switch (skill.target) {
    case 'self':
      return [actor]
    case 'single_ally':
      return explicitTarget === undefined ? [actor] : living(state, { side: actor.side, slot: explicitTarget })
    case 'all_allies':
      return livingRefs(state, actor.side)
    case 'all_enemies':
      return livingRefs(state, foe)
    case 'all':
      return [...livingRefs(state, actor.side), ...livingRefs(state, foe)]
    case 'single_enemy':
    default: {
      const ref = explicitTarget === undefined ? activeRef(state, foe) : { side: foe, slot: explicitTarget }
      return living(state, ref)
    }
  }
}

function living(state: BattleState, ref: SlotRef): SlotRef[] | undefined {
  const target = monsterAt(state, ref)
  if (!target || target.hp <= 0) {
    return undefined
  }
  return [ref]
}

/** Moves each side's active slot onto its first living member when the current one fainted. */
export function promoteActive(state: BattleState): { state: BattleState; events: string[] } {
  const events: string[] = []
  let next = state
  for (const side of ['player', 'enemy'] as const) {
    const current = monsterAt(next, activeRef(next, side))
    if (current && current.hp > 0) {
      continue
    }
    const [replacement] = livingRefs(next, side)
    if (!replacement) {
      continue
    }
    next = { ...next, active: { ...next.active, [side]: replacement.slot } }
    const monster = monsterAt(next, replacement)
    if (monster) {
      events.push(`${monster.name} steps in!`)
    }
  }
  return { state: next, events }
}
