import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { FilesystemError, InvalidArgumentsError, errnoCode, type FilesystemOperation } from "../core/errors.js";
import { INIT_SCRIPT_MODE, getHarnessPaths, relativeFeatureListPath, type HarnessPaths } from "../core/paths.js";
import { createFeatureList, renderFeatureList } from "./feature-list.js";
import { renderInitScript } from "./init-script.js";
import { renderProgressLog } from "./progress-log.js";

export type HarnessLog = (line: string) => void;

export interface HarnessInitOptions {
  projectPath: string;
  featureName: string;
  description: string;
  now?: Date;
  log?: HarnessLog;
}

export interface HarnessInitResult {
  paths: HarnessPaths;
  createdProjectDir: boolean;
  files: string[];
  createdAt: string;
}

export const HarnessInputSchema = z.object({
  projectPath: z.string().min(1, "project path must not be empty"),
  featureName: z
    .string()
    .min(1, "feature name must not be empty")
    .refine((name) => !name.includes("\0"), "feature name must not contain NUL bytes")
    .refine((name) => !path.isAbsolute(name), "feature name must be a relative name")
    .refine((name) => !name.split(/[\\/]/).includes(".."), "feature name must not contain '..' segments"),
  description: z.string()
});

export type HarnessInput = z.infer<typeof HarnessInputSchema>;

export function parseHarnessInput(input: unknown): HarnessInput {
  const result = HarnessInputSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues.map((issue) => issue.message).join("; ");
    throw new InvalidArgumentsError(`Invalid arguments: ${details}`, { cause: result.error });
  }
  return result.data;
}

async function guard<T>(operation: FilesystemOperation, target: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    throw new FilesystemError(operation, target, error);
  }
}

async function directoryExists(dir: string): Promise<boolean> {
  try {
    await fs.stat(dir);
    return true;
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return false;
    throw new FilesystemError("stat", dir, error);
  }
}

async function writeArtifact(filePath: string, content: string, log: HarnessLog): Promise<void> {
  await guard("write", filePath, () => fs.writeFile(filePath, content, "utf8"));
  log(`✅ Created ${filePath}`);
}

export async function initializeHarness(options: HarnessInitOptions): Promise<HarnessInitResult> {
  const input = parseHarnessInput({
    projectPath: options.projectPath,
    featureName: options.featureName,
    description: options.description
  });
  const log = options.log ?? ((line: string) => console.log(line));
  const now = options.now ?? new Date();
  const paths = getHarnessPaths(input.projectPath, input.featureName);

  const createdProjectDir = !(await directoryExists(paths.project));
  if (createdProjectDir) {
    await guard("mkdir", paths.project, () => fs.mkdir(paths.project, { recursive: true }));
    log(`📁 Created project directory: ${paths.project}`);
  }
  await guard("mkdir", paths.harness, () => fs.mkdir(paths.harness, { recursive: true }));

  log("");
  log(`🔧 Initializing harness for: ${paths.projectName}`);
  log(`   Description: ${input.description}`);
  log("");

  const featureList = createFeatureList(paths.projectName, input.description, now);
  await writeArtifact(paths.featureList, renderFeatureList(featureList), log);

  await writeArtifact(
    paths.progress,
    renderProgressLog({ projectName: paths.projectName, description: input.description, now }),
    log
  );

  await guard("write", paths.initScript, () => fs.writeFile(paths.initScript, renderInitScript(), "utf8"));
  // writeFile only applies mode on creation, so re-runs need the explicit chmod.
  await guard("chmod", paths.initScript, () => fs.chmod(paths.initScript, INIT_SCRIPT_MODE));
  log(`✅ Created ${paths.initScript}`);

  log("");
  log("✅ Harness initialization complete!");
  log("");
  log("Next steps:");
  log(`  1. cd ${paths.project}`);
  log(`  2. Edit ${relativeFeatureListPath(paths)} to add your features`);
  log("  3. git init && git add . && git commit -m 'Initial setup'");
  log("  4. Start implementing features one at a time");

  return {
    paths,
    createdProjectDir,
    files: [paths.featureList, paths.progress, paths.initScript],
    createdAt: featureList.project.created
  };
}
