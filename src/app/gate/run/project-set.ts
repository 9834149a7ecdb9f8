import type { Project, ProjectSet } from "../types.js";

export type ProjectSetOptions = {
  projects: readonly string[];
  selfProject?: string;
  skipSelfProject: boolean;
};

/**
 * Configured projects in order, with the gate tooling project first unless skipped.
 * Later duplicates are dropped so log output stays reproducible.
 */
export function buildProjectSet(options: ProjectSetOptions): ProjectSet {
  const ordered: Project[] = [];
  const seen = new Set<Project>();

  const add = (project: Project): void => {
    const trimmed = project.trim();
    if (trimmed.length === 0 || seen.has(trimmed)) return;
    seen.add(trimmed);
    ordered.push(trimmed);
  };

  if (options.selfProject && !options.skipSelfProject) {
    add(options.selfProject);
  }
  for (const project of options.projects) {
    add(project);
  }

  return Object.freeze(ordered);
}
