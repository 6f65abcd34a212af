import path from "node:path";

export const HARNESS_ROOT_DIR = "long_running";
export const FEATURE_LIST_FILE = "feature_list.json";
export const PROGRESS_FILE = "progress.txt";
export const INIT_SCRIPT_FILE = "init.sh";
export const INIT_SCRIPT_MODE = 0o755;

export interface HarnessPaths {
  project: string;
  projectName: string;
  harness: string;
  featureList: string;
  progress: string;
  initScript: string;
}

export function getHarnessPaths(projectPath: string, featureName: string): HarnessPaths {
  const project = path.resolve(projectPath);
  const harness = path.join(project, HARNESS_ROOT_DIR, featureName);
  return {
    project,
    projectName: path.basename(project),
    harness,
    featureList: path.join(harness, FEATURE_LIST_FILE),
    progress: path.join(harness, PROGRESS_FILE),
    initScript: path.join(harness, INIT_SCRIPT_FILE)
  };
}

/** Path of the feature list relative to the project root, always with forward slashes. */
export function relativeFeatureListPath(paths: HarnessPaths): string {
  return path.relative(paths.project, paths.featureList).split(path.sep).join("/");
}
