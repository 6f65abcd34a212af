export interface ProgressLogInput {
  projectName: string;
  description: string;
  now?: Date;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** UTC, minute precision, matching the clock feature_list.json records. */
export function formatLogTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())} UTC`
  );
}

export function renderProgressLog(input: ProgressLogInput): string {
  const stamp = formatLogTimestamp(input.now ?? new Date());
  return `# Project Progress Log

## Project: ${input.projectName}
**Description:** ${input.description}
**Created:** ${stamp}

---

## Session: ${stamp} (Initialization)

### What was done:
- Initialized project harness
- Created feature_list.json with initial feature requirements
- Created progress.txt for session tracking
- Created init.sh for environment setup

### Current State:
- Project is ready for development
- Feature list needs to be expanded based on requirements

### Next Steps:
- Review and expand feature_list.json with all required features
- Implement the first feature from the list

---

## Notes for Future Sessions

When starting a new session:
1. Read this file to understand recent progress
2. Check git log for commit history
3. Review feature_list.json for next task
4. Run ./init.sh to start development environment
5. Pick ONE feature and implement it
6. Update this file before ending session

`;
}
