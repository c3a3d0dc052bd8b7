/**
 * Text rendering of tool results: the payload as JSON, then any suggested
 * follow-up calls, then descriptions of the fields the payload actually uses.
 */

export interface ToolResponse {
  content: Array<{ type: 'text'; text: string }>;
  [key: string]: unknown;
}

export interface ResponseBuilderOptions {
  data: unknown;
  /** Descriptions keyed by field name; only fields present in `data` are rendered */
  fieldDescriptions: Record<string, string>;
  nextActions?: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPresent(value: unknown): boolean {
  return value !== null && value !== undefined;
}

/**
 * Drop null and undefined object members at every depth, so a download status
 * only shows `total_bytes`, `path` and `error` once they apply.
 * Array elements keep their positions: stream samples are index-aligned.
 */
export function removeNullFields(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => removeNullFields(item));
  }
  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, member]) => isPresent(member))
        .map(([key, member]) => [key, removeNullFields(member)])
    );
  }
  return value;
}

function collectKeys(value: unknown, keys: Set<string> = new Set()): Set<string> {
  if (Array.isArray(value)) {
    value.forEach((item) => collectKeys(item, keys));
  } else if (isRecord(value)) {
    for (const [key, member] of Object.entries(value)) {
      keys.add(key);
      collectKeys(member, keys);
    }
  }
  return keys;
}

export function filterFieldDescriptions(
  descriptions: Record<string, string>,
  data: unknown
): Record<string, string> {
  const keys = collectKeys(data);
  return Object.fromEntries(Object.entries(descriptions).filter(([key]) => keys.has(key)));
}

function renderNextActions(actions: string[]): string {
  return ['SUGGESTED NEXT ACTIONS:', ...actions.map((action) => `  - ${action}`)].join('\n');
}

function renderFieldDescriptions(descriptions: Record<string, string>): string {
  return `FIELD DESCRIPTIONS:\n${JSON.stringify(descriptions, null, 2)}`;
}

/**
 * Sections are separated by a blank line; the first is always the JSON payload.
 * Sections with nothing to say are left out.
 */
export function buildToolResponse({ data, fieldDescriptions, nextActions = [] }: ResponseBuilderOptions): ToolResponse {
  const payload = removeNullFields(data);
  const described = filterFieldDescriptions(fieldDescriptions, payload);

  const sections = [JSON.stringify(payload, null, 2)];
  if (nextActions.length > 0) {
    sections.push(renderNextActions(nextActions));
  }
  if (Object.keys(described).length > 0) {
    sections.push(renderFieldDescriptions(described));
  }

  return { content: [{ type: 'text', text: sections.join('\n\n') }] };
}
