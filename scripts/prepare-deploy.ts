import { copyFileSync, writeFileSync } from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";

export const IGNORED_PATTERNS = [
  "__pycache__/",
  "*.pyc",
  "*.pyo",
  "*.pyd",
  ".env",
  ".venv/",
  "venv/",
  "uploads/",
  "processed/",
  "*.log",
  ".DS_Store",
];

export const PANEL_FILES = [
  "single_file_panel.py",
  "requirements.txt",
  "Procfile",
  "runtime.txt",
  "railway.json",
];

export interface PrepareDeployOptions {
  cwd?: string;
  sourceManifest?: string;
  targetManifest?: string;
  log?: (line: string) => void;
}

export function deployGuide(): string[] {
  return [
    "📋 Next Steps:",
    "1. 🌐 Create a GitHub account: https://github.com",
    "2. 📂 Create a new repository",
    "3. 📤 Upload these files:",
    ...PANEL_FILES.map((file) => `   - ${file}`),
    "",
    "4. 🚂 Create a Railway account: https://railway.app",
    "5. ➕ New Project → Deploy from GitHub",
    "6. 🔗 Select the GitHub repository",
    "7. ⚡ Railway deploys it automatically",
    "",
    "🎯 You will get a Railway URL like:",
    "   https://your-project-name.up.railway.app",
    "",
    "📱 Point the app shell at it:",
    "   VITE_REMOTE_URL=https://your-railway-url npm run build",
    "",
    "💡 Alternative Platforms:",
    "   - Render.com (easy)",
    "   - Fly.io (fast)",
    "   - PythonAnywhere (Python focused)",
  ];
}

/**
 * Stage the panel for Railway: rename the deploy manifest to the name the
 * platform expects, write the ignore list, print the guide.
 * A missing source manifest throws and stops before anything else is written.
 */
export function prepareDeployment(options: PrepareDeployOptions = {}): void {
  const {
    cwd = process.cwd(),
    sourceManifest = "requirements_deploy.txt",
    targetManifest = "requirements.txt",
    log = console.log,
  } = options;

  log("🚀 Railway Deployment Guide for Screenshot Panel");
  log("================================================");
  log("");
  log("📁 Step 1: Preparing deployment files...");
  copyFileSync(path.join(cwd, sourceManifest), path.join(cwd, targetManifest));

  writeFileSync(path.join(cwd, ".gitignore"), `${IGNORED_PATTERNS.join("\n")}\n`);

  log("✅ Deployment files ready!");
  log("");
  deployGuide().forEach((line) => log(line));
}

const invokedPath = process.argv[1];
if (invokedPath && import.meta.url === pathToFileURL(invokedPath).href) {
  try {
    prepareDeployment();
  } catch (error) {
    console.error(
      "[PrepareDeploy]",
      error instanceof Error ? error.message : String(error)
    );
    process.exitCode = 1;
  }
}
