/**
 * Stampboard — src/config/pointsConfig.ts
 * WHAT: Check-in categories (with their points) and reward tiers, kept in a JSON file.
 * FLOWS:
 *  - loadPointsConfig(path) → read → fill missing keys from defaults → zod → PointsConfig
 *  - savePointsConfig(path, config) → zod → pretty JSON on disk
 *  - categoryPoints(config, category) → points | null
 * DOCS:
 *  - zod: https://zod.dev
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { StorageError, ValidationError, classifyError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

const categorySchema = z.object({
  category: z.string().trim().min(1, "category name is required"),
  points: z.number().int().min(0),
  tips: z.string().default(""),
});

const rewardSchema = z.object({
  threshold: z.number().int().min(1),
  reward: z.string().trim().min(1, "reward text is required"),
});

export const pointsConfigSchema = z
  .object({
    categories: z.array(categorySchema).min(1, "at least one category is required"),
    rewards: z.array(rewardSchema),
  })
  .superRefine((cfg, refinement) => {
    const seen = new Set<string>();
    cfg.categories.forEach((c, i) => {
      if (seen.has(c.category)) {
        refinement.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["categories", i, "category"],
          message: `duplicate category "${c.category}"`,
        });
      }
      seen.add(c.category);
    });
  });

export type PointsConfig = z.infer<typeof pointsConfigSchema>;

export const DEFAULT_POINTS_CONFIG: PointsConfig = {
  categories: [
    { category: "volunteer", points: 1, tips: "Volunteer at an event, help with setup, or bring a friend to volunteer" },
    { category: "kitchen", points: 1, tips: "Cook, deliver meals, or run a cooking workshop" },
    { category: "culture", points: 2, tips: "Attend a study group, retreat, or cultural workshop" },
  ],
  rewards: [
    { threshold: 3, reward: "Free dinner" },
    { threshold: 6, reward: "Bubble tea" },
    { threshold: 10, reward: "Free event ticket" },
    { threshold: 20, reward: "Volunteer appreciation banquet" },
  ],
};

function defaults(): PointsConfig {
  return structuredClone(DEFAULT_POINTS_CONFIG);
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

/**
 * loadPointsConfig
 * WHAT: Reads the config file, falling back to defaults.
 * HOW: A missing file, unreadable JSON, or content that fails validation all
 *      give the defaults (the last two logged at warn). Top-level keys missing
 *      from an otherwise valid object are taken from the defaults.
 */
export function loadPointsConfig(configPath: string): PointsConfig {
  if (!fs.existsSync(configPath)) {
    logger.debug({ configPath }, "[pointsConfig] no config file, using defaults");
    return defaults();
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (err) {
    logger.warn({ err, configPath }, "[pointsConfig] could not read config file, using defaults");
    return defaults();
  }

  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    logger.warn({ configPath }, "[pointsConfig] config file is not a JSON object, using defaults");
    return defaults();
  }

  const merged = { ...defaults(), ...data };
  const parsed = pointsConfigSchema.safeParse(merged);
  if (!parsed.success) {
    logger.warn(
      { configPath, issues: formatIssues(parsed.error) },
      "[pointsConfig] invalid config file, using defaults"
    );
    return defaults();
  }
  return parsed.data;
}

/**
 * Validates before writing; a rejected config throws ValidationError and the
 * file is left as it was. Write failures surface as StorageError.
 */
export function savePointsConfig(configPath: string, input: unknown): PointsConfig {
  const parsed = pointsConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError("config", `Invalid points configuration: ${formatIssues(parsed.error)}`);
  }

  try {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, JSON.stringify(parsed.data, null, 2) + "\n", "utf8");
  } catch (err) {
    const classified = classifyError(err);
    const code = classified.kind === "storage" ? classified.code : "WRITE_FAILED";
    throw new StorageError(`Could not save ${configPath}: ${classified.message}`, code, { cause: err });
  }

  logger.info(
    { configPath, categories: parsed.data.categories.length, rewards: parsed.data.rewards.length },
    "[pointsConfig] saved"
  );
  return parsed.data;
}

export function categoryPoints(config: PointsConfig, category: string): number | null {
  return config.categories.find((c) => c.category === category)?.points ?? null;
}
