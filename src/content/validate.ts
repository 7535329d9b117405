import { DEFAULTS } from '@config/defaults';
import {
  MONSTER_TYPES,
  SKILL_CATEGORIES,
  SKILL_TARGETS,
  type GameConfig,
  type MonsterType,
  type SkillDef,
  type TypeChart,
} from '@config/schema';
import { z } from 'zod';

import skillData from './data/skills.json';

const EFFECTIVENESS_VALUES: readonly number[] = [0.5, 1, 1.5];

const toNumber = (val: unknown) => {
  if (val === '' || val === null || val === undefined) return undefined;
  const num = Number(val);
  return Number.isFinite(num) ? num : undefined;
};

const numberOr = (fallback: number) => z.preprocess(toNumber, z.number().finite()).catch(fallback);

const nonNegativeOr = (fallback: number) =>
  z.preprocess(toNumber, z.number().finite().min(0)).catch(fallback);

const boundedOr = (fallback: number, min: number, max: number) =>
  z.preprocess(toNumber, z.number().finite().min(min).max(max)).catch(fallback);

const stringValue = () =>
  z.preprocess((val) => {
    if (val === null || val === undefined) return undefined;
    return String(val);
  }, z.string().min(1));

const optionalString = () => stringValue().optional().catch(undefined);

const section = <T extends z.ZodRawShape>(shape: T) =>
  z.preprocess((val) => (isRecord(val) ? val : {}), z.object(shape).strip());

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMonsterType(value: string): value is MonsterType {
  return MONSTER_TYPES.some((type) => type === value);
}

const SkillSchema = z
  .object({
    id: stringValue(),
    name: stringValue(),
    description: optionalString(),
    category: z.enum(SKILL_CATEGORIES),
    target: z.enum(SKILL_TARGETS).catch('single_enemy'),
    mpCost: nonNegativeOr(0),
    power: nonNegativeOr(0),
    accuracy: nonNegativeOr(100),
    priority: numberOr(0).transform((val) => Math.trunc(val)),
  })
  .strip();

export function repairSkills(input: unknown): Record<string, SkillDef> {
  const skills: Record<string, SkillDef> = {};
  if (!isRecord(input)) {
    return skills;
  }
  for (const [key, value] of Object.entries(input)) {
    const parsed = SkillSchema.safeParse(isRecord(value) ? { id: key, ...value } : value);
    if (parsed.success) {
      skills[key] = parsed.data;
    }
  }
  return skills;
}

export function repairTypeChart(input: unknown): TypeChart {
  if (!isRecord(input)) {
    return DEFAULTS.balance.TYPE_CHART;
  }
  const chart: TypeChart = {};
  for (const [attacking, row] of Object.entries(input)) {
    if (!isMonsterType(attacking) || !isRecord(row)) continue;
    const entries: Partial<Record<MonsterType, number>> = {};
    for (const [defending, raw] of Object.entries(row)) {
      const value = toNumber(raw);
      if (!isMonsterType(defending) || value === undefined) continue;
      if (!EFFECTIVENESS_VALUES.includes(value)) continue;
      entries[defending] = value;
    }
    chart[attacking] = entries;
  }
  return chart;
}

function repairCaptureItems(input: unknown): Record<string, number> {
  if (!isRecord(input)) {
    return { ...DEFAULTS.balance.CAPTURE_ITEMS };
  }
  const items: Record<string, number> = {};
  for (const [id, raw] of Object.entries(input)) {
    const bonus = toNumber(raw);
    if (bonus !== undefined && bonus >= 0) {
      items[id] = bonus;
    }
  }
  return items;
}

const { balance, ai, pacing } = DEFAULTS;

// Escape odds never leave this band, whatever the tuning.
const FLEE_MIN = 0.1;
const FLEE_MAX = 0.9;

const BalanceSchema = section({
  CRIT_CHANCE: nonNegativeOr(balance.CRIT_CHANCE),
  CRIT_MULT: nonNegativeOr(balance.CRIT_MULT),
  VARIANCE: boundedOr(balance.VARIANCE, 0, 1),
  LEVEL_STEP: numberOr(balance.LEVEL_STEP),
  MIN_DAMAGE: boundedOr(balance.MIN_DAMAGE, 1, Number.MAX_SAFE_INTEGER),
  TYPE_CHART: z.unknown().transform(repairTypeChart),
  DEFEND_MULT: nonNegativeOr(balance.DEFEND_MULT),
  FLEE_BASE: numberOr(balance.FLEE_BASE),
  FLEE_AGILITY_STEP: numberOr(balance.FLEE_AGILITY_STEP),
  FLEE_FLOOR: boundedOr(balance.FLEE_FLOOR, FLEE_MIN, FLEE_MAX),
  FLEE_CEIL: boundedOr(balance.FLEE_CEIL, FLEE_MIN, FLEE_MAX),
  BASIC_ATTACK: section({
    power: nonNegativeOr(balance.BASIC_ATTACK.power),
    accuracy: nonNegativeOr(balance.BASIC_ATTACK.accuracy),
  }),
  CAPTURE_ITEMS: z.unknown().transform(repairCaptureItems),
  CAPTURE_HP_WEIGHT: nonNegativeOr(balance.CAPTURE_HP_WEIGHT),
}).transform((b) =>
  b.FLEE_FLOOR > b.FLEE_CEIL ? { ...b, FLEE_FLOOR: balance.FLEE_FLOOR, FLEE_CEIL: balance.FLEE_CEIL } : b,
);

const AiSchema = section({
  SKILL_MP_THRESHOLD: numberOr(ai.SKILL_MP_THRESHOLD),
  SKILL_CHANCE: nonNegativeOr(ai.SKILL_CHANCE),
  LOW_HP_RATIO: nonNegativeOr(ai.LOW_HP_RATIO),
  DEFEND_CHANCE: nonNegativeOr(ai.DEFEND_CHANCE),
});

const PacingSchema = section({
  ACTION_DELAY_MS: nonNegativeOr(pacing.ACTION_DELAY_MS),
  TURN_DELAY_MS: nonNegativeOr(pacing.TURN_DELAY_MS),
});

const GameConfigSchema = section({
  __version: numberOr(DEFAULTS.__version),
  skills: z.unknown().transform(repairSkills),
  balance: BalanceSchema,
  ai: AiSchema,
  pacing: PacingSchema,
});

const CATALOG_SKILLS = repairSkills(skillData);

export function migrate(cfg: GameConfig): GameConfig {
  if (!cfg.__version || cfg.__version === 1) {
    return { ...cfg, __version: 1 };
  }
  return cfg;
}

export function validateAndRepair(input: unknown): GameConfig {
  const parsed = GameConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    return migrate({ ...DEFAULTS, skills: { ...CATALOG_SKILLS } });
  }
  return migrate({ ...parsed.data, skills: { ...CATALOG_SKILLS, ...parsed.data.skills } });
}

const whole = (label: string) => z.number().int(`${label} must be a whole number`);

export const MonsterSchema = z
  .object({
    id: z.string().min(1, 'monster id is required'),
    name: z.string().min(1, 'monster name is required'),
    level: whole('level').min(1),
    type1: z.enum(MONSTER_TYPES),
    type2: z.enum(MONSTER_TYPES).optional(),
    hp: whole('hp').min(0),
    mp: whole('mp').min(0),
    stats: z.object({
      maxHp: whole('maxHp').min(1),
      maxMp: whole('maxMp').min(0),
      attack: whole('attack').min(0),
      defense: whole('defense').min(0),
      agility: whole('agility').min(0),
      magic: whole('magic').min(0),
      wisdom: whole('wisdom').min(0),
    }),
    skills: z.array(z.string()).default([]),
    captureRate: whole('captureRate').min(0).max(255).default(100),
  })
  .superRefine((monster, ctx) => {
    if (monster.hp > monster.stats.maxHp) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['hp'],
        message: `${monster.name} has ${monster.hp} HP but only ${monster.stats.maxHp} max`,
      });
    }
    if (monster.mp > monster.stats.maxMp) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['mp'],
        message: `${monster.name} has ${monster.mp} MP but only ${monster.stats.maxMp} max`,
      });
    }
  });

export type MonsterInput = z.input<typeof MonsterSchema>;
