import { afterEach, describe, expect, it, vi } from 'vitest'

import { DEFAULTS } from '@config/defaults'
import { CONFIG, exportConfig, importConfig, resetConfig, setConfig, subscribe } from '@config/store'
import { toSkill } from '@content/adapters'
import { Skills, skillCatalog } from '@content/registry'
import { migrate, repairSkills, validateAndRepair } from '@content/validate'

afterEach(() => {
  resetConfig()
})

describe('config validation', () => {
  it('fills every section from defaults and ships the skill catalog', () => {
    const cfg = validateAndRepair({})
    expect(cfg.balance).toEqual(DEFAULTS.balance)
    expect(cfg.ai).toEqual(DEFAULTS.ai)
    expect(cfg.pacing).toEqual(DEFAULTS.pacing)
    expect(cfg.skills.fireball).toMatchObject({ name: 'Fireball', category: 'magical', mpCost: 8, power: 75, accuracy: 90 })
    expect(cfg.skills.quick_strike.priority).toBe(1)
  })

  it('repairs bad numbers field by field', () => {
    const cfg = validateAndRepair({
      balance: { CRIT_CHANCE: 'abc', VARIANCE: '0.2', FLEE_FLOOR: -1, BASIC_ATTACK: { power: '60' } },
      ai: { SKILL_CHANCE: null },
    })
    expect(cfg.balance.CRIT_CHANCE).toBe(0.05)
    expect(cfg.balance.VARIANCE).toBe(0.2)
    expect(cfg.balance.FLEE_FLOOR).toBe(0.1)
    expect(cfg.balance.BASIC_ATTACK).toEqual({ power: 60, accuracy: 95 })
    expect(cfg.ai.SKILL_CHANCE).toBe(0.4)
  })

  it('repairs tuning that would break damage, variance and escape bounds', () => {
    const cfg = validateAndRepair({
      balance: { MIN_DAMAGE: 0, VARIANCE: 1.5, FLEE_FLOOR: 0.05, FLEE_CEIL: 0.95 },
    })
    expect(cfg.balance.MIN_DAMAGE).toBe(1)
    expect(cfg.balance.VARIANCE).toBe(0.15)
    expect(cfg.balance.FLEE_FLOOR).toBe(0.1)
    expect(cfg.balance.FLEE_CEIL).toBe(0.9)

    const crossed = validateAndRepair({ balance: { FLEE_FLOOR: 0.7, FLEE_CEIL: 0.3 } })
    expect([crossed.balance.FLEE_FLOOR, crossed.balance.FLEE_CEIL]).toEqual([0.1, 0.9])

    const narrowed = validateAndRepair({ balance: { FLEE_FLOOR: 0.2, FLEE_CEIL: 0.6, MIN_DAMAGE: 3 } })
    expect([narrowed.balance.FLEE_FLOOR, narrowed.balance.FLEE_CEIL, narrowed.balance.MIN_DAMAGE]).toEqual([0.2, 0.6, 3])
  })

  it('falls back to defaults for non-object input', () => {
    for (const input of [null, undefined, 42, 'config', []]) {
      const cfg = validateAndRepair(input)
      expect(cfg.balance.CRIT_MULT).toBe(1.5)
      expect(cfg.__version).toBe(1)
    }
  })

  it('drops malformed skills and keys the rest by their entry name', () => {
    const skills = repairSkills({
      zap: { name: 'Zap', category: 'magical', power: '30', mpCost: -4 },
      broken: { name: 'Broken', category: 'cosmic' },
      nameless: { category: 'support' },
      junk: 7,
    })
    expect(Object.keys(skills)).toEqual(['zap'])
    expect(skills.zap).toEqual({
      id: 'zap',
      name: 'Zap',
      category: 'magical',
      target: 'single_enemy',
      mpCost: 0,
      power: 30,
      accuracy: 100,
      priority: 0,
    })
  })

  it('merges configured skills over the catalog', () => {
    const cfg = validateAndRepair({ skills: { fireball: { name: 'Big Fireball', category: 'magical', power: 90 } } })
    expect(cfg.skills.fireball.name).toBe('Big Fireball')
    expect(cfg.skills.fireball.power).toBe(90)
    expect(cfg.skills.heal.name).toBe('Heal')
  })

  it('normalises the config version', () => {
    expect(migrate({ ...DEFAULTS, __version: 0 }).__version).toBe(1)
    expect(migrate({ ...DEFAULTS, __version: 2 }).__version).toBe(2)
  })
})

describe('config store and skill registry', () => {
  it('rebuilds the registry when the config changes', () => {
    expect(skillCatalog.lookup('fireball')?.mpCost).toBe(8)
    expect(skillCatalog.lookup('ember')).toBeUndefined()

    setConfig({ skills: { ember: { name: 'Ember', category: 'magical', power: 35, mpCost: 3 } } })
    expect(Skills().ember).toMatchObject({ id: 'ember', power: 35, mpCost: 3 })
    expect(skillCatalog.lookup('ember')?.name).toBe('Ember')
    expect(skillCatalog.all().map((skill) => skill.id)).toContain('ember')
    expect(skillCatalog.lookup('toString')).toBeUndefined()
  })

  it('notifies subscribers immediately and on every change', () => {
    const listener = vi.fn()
    const unsubscribe = subscribe(listener)
    expect(listener).toHaveBeenCalledTimes(1)

    setConfig({ balance: { CRIT_MULT: 2 } })
    expect(listener).toHaveBeenCalledTimes(2)
    expect(listener.mock.calls[1][0].balance.CRIT_MULT).toBe(2)

    unsubscribe()
    resetConfig()
    expect(listener).toHaveBeenCalledTimes(2)
  })

  it('round-trips through JSON export and import', () => {
    setConfig({ pacing: { ACTION_DELAY_MS: 120 } })
    const json = exportConfig()
    resetConfig()
    expect(CONFIG().pacing.ACTION_DELAY_MS).toBe(500)

    importConfig(json)
    expect(CONFIG().pacing.ACTION_DELAY_MS).toBe(120)
  })

  it('propagates malformed JSON from import', () => {
    expect(() => importConfig('{not json')).toThrow(SyntaxError)
  })

  it('freezes runtime skills and clamps their numbers', () => {
    const skill = toSkill({ id: 'x', name: 'X', category: 'physical', target: 'single_enemy', mpCost: 2.6, power: 40, accuracy: 140, priority: 1.8 })
    expect(skill.mpCost).toBe(3)
    expect(skill.accuracy).toBe(100)
    expect(skill.priority).toBe(1)
    expect(Object.isFrozen(skill)).toBe(true)
  })
})
