/**
 * JavaScript for Automation script builders
 *
 * Every script is a self-invoking function that prints a JSON
 * MutationResult. Ids and tag names are embedded as single-quoted
 * string literals.
 */

export type TerminalStatus = 'completed' | 'canceled';

/**
 * Quote a value as a single-quoted JavaScript string literal
 */
export function escapeScriptString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
  return `'${escaped}'`;
}

export function scriptStringArray(values: readonly string[]): string {
  return `[${values.map(escapeScriptString).join(', ')}]`;
}

function withTodo(id: string, body: string): string {
  const idLiteral = escapeScriptString(id);
  return `(() => {
  const app = Application('Things3');
  const todo = app.toDos.byId(${idLiteral});
  if (!todo.exists()) return JSON.stringify({ success: false, error: 'Todo not found', id: ${idLiteral} });
${body}
  return JSON.stringify({ success: true, id: ${idLiteral} });
})()`;
}

export function buildSetStatusScript(id: string, status: TerminalStatus): string {
  return withTodo(id, `  todo.status = ${escapeScriptString(status)};`);
}

export function buildAddTagsScript(id: string, tags: readonly string[]): string {
  return withTodo(
    id,
    `  const current = todo.tagNames() || '';
  const existing = current ? current.split(', ') : [];
  const added = ${scriptStringArray(tags)}.filter((tag) => !existing.includes(tag));
  todo.tagNames = existing.concat(added).join(', ');`
  );
}
