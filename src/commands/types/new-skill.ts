export interface NewSkillCommandOptions {
  root?: string;
  description?: string;
}
