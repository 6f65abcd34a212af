import { z } from "zod";

export type FeatureCategory = "setup" | "core" | (string & {});
export type FeaturePriority = "high" | "medium" | "low";

export interface Feature {
  id: number;
  category: FeatureCategory;
  description: string;
  steps: string[];
  priority: FeaturePriority;
  passes: boolean;
}

export interface FeatureList {
  project: {
    name: string;
    description: string;
    created: string;
  };
  features: Feature[];
  metadata: {
    total_features: number;
    completed_features: number;
    last_updated: string;
  };
}

const FeatureSchema = z.object({
  id: z.number().int().min(1),
  category: z.string().min(1),
  description: z.string(),
  steps: z.array(z.string()),
  priority: z.enum(["high", "medium", "low"]),
  passes: z.boolean()
});

export const FeatureListSchema = z
  .object({
    project: z.object({
      name: z.string(),
      description: z.string(),
      created: z.string().min(1)
    }),
    features: z.array(FeatureSchema),
    metadata: z.object({
      total_features: z.number().int().min(0),
      completed_features: z.number().int().min(0),
      last_updated: z.string().min(1)
    })
  })
  .refine((list) => list.metadata.total_features === list.features.length, {
    message: "total_features must equal the number of features",
    path: ["metadata", "total_features"]
  })
  .refine((list) => list.metadata.completed_features === list.features.filter((f) => f.passes).length, {
    message: "completed_features must equal the number of passing features",
    path: ["metadata", "completed_features"]
  });

const STARTER_FEATURES: readonly Feature[] = [
  {
    id: 1,
    category: "setup",
    description: "Project initialization and basic structure",
    steps: ["Create project directory structure", "Initialize package management", "Verify basic setup works"],
    priority: "high",
    passes: false
  },
  {
    id: 2,
    category: "core",
    description: "[TODO: Add core feature description]",
    steps: ["[TODO: Add verification step 1]", "[TODO: Add verification step 2]"],
    priority: "high",
    passes: false
  }
];

export function createFeatureList(projectName: string, description: string, now = new Date()): FeatureList {
  const timestamp = now.toISOString();
  const features = STARTER_FEATURES.map((feature) => ({ ...feature, steps: [...feature.steps] }));
  return {
    project: {
      name: projectName,
      description,
      created: timestamp
    },
    features,
    metadata: {
      total_features: features.length,
      completed_features: features.filter((feature) => feature.passes).length,
      last_updated: timestamp
    }
  };
}

export function validateFeatureList(list: unknown): { valid: boolean; errors: string[] } {
  const result = FeatureListSchema.safeParse(list);
  if (result.success) return { valid: true, errors: [] };
  return {
    valid: false,
    errors: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
  };
}

export function renderFeatureList(list: FeatureList): string {
  const validation = validateFeatureList(list);
  if (!validation.valid) {
    throw new Error(`Invalid feature list: ${validation.errors.join("; ")}`);
  }
  return `${JSON.stringify(list, null, 2)}\n`;
}
