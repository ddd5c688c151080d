/**
 * `checked_when` rule expressions.
 *
 * The only supported form is a single equality over a canonical key:
 *
 *   sexo == 'M'
 *   estado_civil == "C"
 *
 * Parsing is a hand-written scan into a tagged union; anything that does not
 * scan cleanly yields null and the owning mapping is skipped.
 */

export type CheckedWhenExpr = { kind: 'equals'; key: string; literal: string };

export function parseCheckedWhen(source: string): CheckedWhenExpr | null {
  const text = (source ?? '').trim();
  let pos = 0;

  const skipSpaces = () => {
    while (pos < text.length && /\s/.test(text.charAt(pos))) pos++;
  };

  // key: [A-Za-z_]+
  const keyStart = pos;
  while (pos < text.length && /[A-Za-z_]/.test(text.charAt(pos))) pos++;
  if (pos === keyStart) return null;
  const key = text.slice(keyStart, pos).toLowerCase();

  skipSpaces();
  if (text.slice(pos, pos + 2) !== '==') return null;
  pos += 2;
  skipSpaces();

  const quote = text.charAt(pos);
  if (quote !== "'" && quote !== '"') return null;
  pos++;
  const literalStart = pos;
  while (pos < text.length && text.charAt(pos) !== "'" && text.charAt(pos) !== '"') pos++;
  if (pos >= text.length || text.charAt(pos) !== quote) return null;
  const rawLiteral = text.slice(literalStart, pos);
  pos++;

  if (rawLiteral.length === 0 || pos !== text.length) return null;
  return { kind: 'equals', key, literal: rawLiteral.trim() };
}

/** Values trimmed, keyed as given. */
export function buildRuleContext(values: Record<string, string>): Record<string, string> {
  const context: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) context[key] = (value ?? '').trim();
  return context;
}

export function evaluateCheckedWhen(expr: CheckedWhenExpr, context: Record<string, string>): boolean {
  switch (expr.kind) {
    case 'equals':
      return (context[expr.key] ?? '') === expr.literal;
  }
}

/** Parse and evaluate in one step. Null means the rule did not parse. */
export function evalCheckedWhen(source: string, context: Record<string, string>): boolean | null {
  const expr = parseCheckedWhen(source);
  return expr ? evaluateCheckedWhen(expr, context) : null;
}
