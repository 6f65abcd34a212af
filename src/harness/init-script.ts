export interface DependencyManager {
  ecosystem: "node" | "python" | "rust" | "go";
  manifest: string;
  banner: string;
  command: string;
}

/** Checked in order; the generated script acts on the first manifest present only. */
export const DEPENDENCY_MANAGERS: readonly DependencyManager[] = [
  { ecosystem: "node", manifest: "package.json", banner: "📦 Installing Node.js dependencies...", command: "npm install" },
  {
    ecosystem: "python",
    manifest: "requirements.txt",
    banner: "🐍 Installing Python dependencies...",
    command: "pip install -r requirements.txt"
  },
  { ecosystem: "rust", manifest: "Cargo.toml", banner: "🦀 Building Rust project...", command: "cargo build" },
  { ecosystem: "go", manifest: "go.mod", banner: "🐹 Installing Go dependencies...", command: "go mod download" }
];

export function detectDependencyManager(presentFiles: Iterable<string>): DependencyManager | null {
  const present = new Set(presentFiles);
  return DEPENDENCY_MANAGERS.find((manager) => present.has(manager.manifest)) ?? null;
}

function installBlock(managers: readonly DependencyManager[]): string {
  const branches = managers.map((manager, index) => {
    const keyword = index === 0 ? "if" : "elif";
    return [
      `${keyword} [ -f "${manager.manifest}" ]; then`,
      `    echo "${manager.banner}"`,
      `    ${manager.command}`
    ].join("\n");
  });
  return `${branches.join("\n")}\nfi`;
}

export const INIT_SCRIPT = `#!/bin/bash
# Development Environment Initialization Script
# Run this at the start of each coding session

set -e

echo "🚀 Starting development environment..."

# Resolve paths
SCRIPT_DIR="$(cd "$(dirname "$0")" && pwd)"
PROJECT_ROOT="$(cd "$SCRIPT_DIR/../.." && pwd)"

# Navigate to project root
cd "$PROJECT_ROOT"

# Check for common package managers and install dependencies
${installBlock(DEPENDENCY_MANAGERS)}

# Start development server (customize based on your project)
# Uncomment and modify the appropriate line:

# Node.js
# npm run dev &

# Python Flask
# python app.py &

# Python Django
# python manage.py runserver &

# Go
# go run main.go &

echo "✅ Development environment ready!"
echo ""
echo "📋 Quick commands:"
echo "   - Check progress: cat $SCRIPT_DIR/progress.txt"
echo "   - View features:  cat $SCRIPT_DIR/feature_list.json"
echo "   - Git history:    git log --oneline -10"
`;

export function renderInitScript(): string {
  return INIT_SCRIPT;
}
