// ============================================
// Agent Categories
// The fixed set of specialised agents a message can be routed to
// ============================================

export const AGENT_CATEGORIES = ['courses', 'career_paths', 'sales'] as const;

export type AgentCategory = (typeof AGENT_CATEGORIES)[number];

/** Fallback route when nothing scores, and the first tie-break winner */
export const DEFAULT_CATEGORY: AgentCategory = 'courses';

/**
 * Tie-break priority: earlier wins.
 * Matches the declaration order above.
 */
export const CATEGORY_PRIORITY: readonly AgentCategory[] = AGENT_CATEGORIES;

/** Labels shown to users and written into history attributions */
export const CATEGORY_LABELS: Record<AgentCategory, string> = {
   courses: 'cursos',
   career_paths: 'carreras',
   sales: 'ventas',
};
