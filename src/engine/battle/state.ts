import { MonsterSchema, type MonsterInput } from '@content/validate'

import { BattleSetupError } from './errors'
import type { BattleState, BattleType, Monster } from './types'

type Member = MonsterInput | Monster

type Params = {
  player: readonly Member[]
  enemy: readonly Member[]
  type?: BattleType
}

const FLAGS: Record<BattleType, Pick<BattleState, 'isWildEncounter' | 'canFlee' | 'canCapture'>> = {
  wild: { isWildEncounter: true, canFlee: true, canCapture: true },
  trainer: { isWildEncounter: false, canFlee: true, canCapture: false },
  boss: { isWildEncounter: false, canFlee: false, canCapture: false },
}

function parseParty(label: string, members: readonly Member[]): Monster[] {
  if (members.length === 0) {
    throw new BattleSetupError(`${label} party cannot be empty`)
  }
  const issues: string[] = []
  const party: Monster[] = []
  members.forEach((member, slot) => {
    const parsed = MonsterSchema.safeParse(member)
    if (parsed.success) {
      party.push(parsed.data)
    } else {
      for (const issue of parsed.error.issues) {
        const where = issue.path.length ? `.${issue.path.join('.')}` : ''
        issues.push(`${label}[${slot}]${where}: ${issue.message}`)
      }
    }
  })
  if (issues.length) {
    throw new BattleSetupError(`Invalid ${label} party`, issues)
  }
  if (party.every((monster) => monster.hp <= 0)) {
    throw new BattleSetupError(`${label} party has no combatant able to fight`)
  }
  return party
}

function firstLiving(party: readonly Monster[]): number {
  return Math.max(0, party.findIndex((monster) => monster.hp > 0))
}

export function createBattle(p: Params): BattleState {
  const player = parseParty('player', p.player)
  const enemy = parseParty('enemy', p.enemy)
  const battleType = p.type ?? 'wild'
  const opening = 'Battle started!'

  return {
    player,
    enemy,
    active: { player: firstLiving(player), enemy: firstLiving(enemy) },
    phase: 'selecting',
    turn: 1,
    lastEvent: opening,
    log: [opening],
    battleType,
    ...FLAGS[battleType],
    guards: [],
  }
}

export function recordEvent(state: BattleState, event: string): BattleState {
  return { ...state, lastEvent: event, log: [...state.log, event] }
}
