import type { GameConfig, SkillDef } from '@config/schema';
import type { Skill } from '@engine/battle/types';

export function toSkill(def: SkillDef): Skill {
  return Object.freeze({
    id: def.id,
    name: def.name,
    description: def.description,
    category: def.category,
    target: def.target,
    mpCost: Math.max(0, Math.round(def.mpCost)),
    power: Math.max(0, Math.round(def.power)),
    accuracy: Math.max(0, Math.min(100, Math.round(def.accuracy))),
    priority: Math.trunc(def.priority),
  });
}

export function toSkills(cfg: GameConfig): Record<string, Skill> {
  const skills: Record<string, Skill> = {};
  for (const [id, def] of Object.entries(cfg.skills)) {
    skills[id] = toSkill({ ...def, id });
  }
  return skills;
}
