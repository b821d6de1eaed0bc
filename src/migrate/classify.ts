import type { ProjectClassification } from '../model.js';

const TEAM_MEMBER_INDICATORS = ["'s project", "'s tasks", "'s workspace", ' personal', ' individual', ' my '];

export interface ClassifyOptions {
  /** Known team member names ("Jane Doe"). */
  teamMembers?: string[];
  /** Per-project explicit classification, keyed by source project id. */
  overrides?: Record<string, ProjectClassification>;
}

/**
 * Decide whether a project represents a client engagement or one person's
 * internal workspace. Explicit overrides beat the name heuristic.
 */
export function classifyProject(
  project: { id: string; name: string },
  opts: ClassifyOptions = {},
): ProjectClassification {
  const override = opts.overrides?.[project.id];
  if (override) return override;

  const name = project.name.trim().toLowerCase();
  if (!name) return 'team-member';

  // leading-space indicators only match mid-name: "Personal Touch Cleaning" stays a client
  if (TEAM_MEMBER_INDICATORS.some((i) => name.includes(i))) return 'team-member';

  for (const member of opts.teamMembers ?? []) {
    const full = member.trim().toLowerCase();
    if (!full) continue;
    if (name === full || name === `${full}'s` || name.startsWith(`${full}'s `)) return 'team-member';

    const first = full.split(/\s+/)[0] ?? '';
    if (first && name.startsWith(first) && (name.includes("'s") || name.includes(' project'))) {
      return 'team-member';
    }
  }

  return 'client';
}
