import type { GameConfig } from '@config/schema';
import { subscribe } from '@config/store';
import { toSkills } from '@content/adapters';
import type { Skill, SkillCatalog } from '@engine/battle/types';

type SkillMap = Record<string, Skill>;

let skills: SkillMap = {};

export function rebuildFromConfig(cfg: GameConfig) {
  skills = toSkills(cfg);
}

subscribe(rebuildFromConfig);

export const Skills = () => skills;

export const skillCatalog: SkillCatalog = {
  lookup: (skillId) => (Object.prototype.hasOwnProperty.call(skills, skillId) ? skills[skillId] : undefined),
  all: () => Object.values(skills),
};
