/**
 * @module variable-resolver
 * `{{env.NAME}}` substitution for configuration values.
 */

export type EnvContext = Record<string, string | undefined>;

/**
 * Replace `{{env.NAME}}` placeholders in a string.
 *
 * Unknown variables are preserved as-is (e.g. `{{env.MISSING}}` stays
 * `{{env.MISSING}}`), so the later validation step reports them.
 */
export function resolveVariables(template: string, env: EnvContext): string {
  return template.replace(/\{\{(.+?)\}\}/g, (match, expr: string) => {
    const trimmed = expr.trim();
    if (!trimmed.startsWith('env.')) {
      return match;
    }
    const value = env[trimmed.slice(4)];
    return value ?? `{{${trimmed}}}`;
  });
}

/**
 * Recursively resolve placeholders in strings nested inside arrays and
 * objects. Keys are not resolved; other primitives are returned as-is.
 */
export function resolveObjectVariables(obj: unknown, env: EnvContext): unknown {
  if (typeof obj === 'string') {
    return resolveVariables(obj, env);
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveObjectVariables(item, env));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveObjectVariables(value, env);
    }
    return result;
  }

  return obj;
}
