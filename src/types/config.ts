import type { z } from "zod";
import type {
  LogLevelSchema,
  SkillbaseConfigSchema,
} from "../schemas/config-schema.js";

export type SkillbaseConfig = z.infer<typeof SkillbaseConfigSchema>;

export type LogLevel = z.infer<typeof LogLevelSchema>;
