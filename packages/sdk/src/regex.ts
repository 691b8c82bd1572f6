/**
 * Compilation of stored correction rules into host regular expressions
 *
 * Context documents are shared with other tooling and store their rules in the
 * PCRE-style dialect: named groups as (?P<name>...), leading inline flags such
 * as (?i), \A and \Z anchors, and replacement templates using \1 or \g<name>.
 * Everything here maps that dialect onto RegExp so stored rules keep their meaning.
 *
 * Compiled rules always run with the global and multiline flags.
 */

import { isJsonObject } from "./io.js";

export type ReplacementToken =
  | { kind: "literal"; text: string }
  | { kind: "group"; ref: number | string };

export interface CompiledCorrection {
  name: string;
  regex: RegExp;
  apply(text: string): string;
}

const SUPPORTED_INLINE_FLAGS = new Set(["i", "m", "s"]);

const TEMPLATE_ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  f: "\f",
  v: "\v",
  "\\": "\\",
};

/**
 * Translate a stored pattern into a RegExp source plus any extra flags
 * @throws SyntaxError for constructs the host engine cannot express
 */
export function translatePattern(pattern: string): { source: string; flags: string } {
  let rest = pattern;
  const flags = new Set<string>();

  // Leading inline flag groups: (?i), (?is), ...
  let inline = /^\(\?([a-zA-Z]+)\)/.exec(rest);
  while (inline) {
    for (const flag of inline[1] ?? "") {
      if (!SUPPORTED_INLINE_FLAGS.has(flag)) {
        throw new SyntaxError(`Unsupported inline flag "${flag}"`);
      }
      flags.add(flag);
    }
    rest = rest.slice(inline[0].length);
    inline = /^\(\?([a-zA-Z]+)\)/.exec(rest);
  }

  let source = "";
  for (let i = 0; i < rest.length; i++) {
    const ch = rest[i];
    if (ch === "\\" && i + 1 < rest.length) {
      const next = rest[i + 1];
      if (next === "A") {
        source += "(?<![\\s\\S])";
      } else if (next === "Z") {
        source += "(?![\\s\\S])";
      } else {
        source += ch + next;
      }
      i++;
      continue;
    }
    if (rest.startsWith("(?P<", i)) {
      source += "(?<";
      i += 3;
      continue;
    }
    const backref = /^\(\?P=(\w+)\)/.exec(rest.slice(i));
    if (backref) {
      source += `\\k<${backref[1]}>`;
      i += backref[0].length - 1;
      continue;
    }
    source += ch;
  }

  // Multiline is always on; only the remaining inline flags are extra
  flags.delete("m");
  return { source, flags: [...flags].join("") };
}

/**
 * Parse a replacement template into literal text and group references
 * @throws SyntaxError for malformed escapes
 */
export function parseReplacement(template: string): ReplacementToken[] {
  const tokens: ReplacementToken[] = [];
  let literal = "";

  const flush = () => {
    if (literal) {
      tokens.push({ kind: "literal", text: literal });
      literal = "";
    }
  };

  for (let i = 0; i < template.length; i++) {
    const ch = template[i];
    if (ch !== "\\") {
      literal += ch;
      continue;
    }

    const next = template[i + 1];
    if (next === undefined) {
      throw new SyntaxError("Replacement ends with a dangling backslash");
    }

    if (next === "g") {
      const named = /^\\g<([^>]+)>/.exec(template.slice(i));
      if (!named || named[1] === undefined) {
        throw new SyntaxError(`Malformed group reference at position ${i}`);
      }
      flush();
      const ref = named[1];
      tokens.push({ kind: "group", ref: /^\d+$/.test(ref) ? Number(ref) : ref });
      i += named[0].length - 1;
      continue;
    }

    const digits = /^\\(\d{1,2})/.exec(template.slice(i));
    if (digits && digits[1] !== undefined && digits[1] !== "0" && !digits[1].startsWith("0")) {
      flush();
      tokens.push({ kind: "group", ref: Number(digits[1]) });
      i += digits[0].length - 1;
      continue;
    }

    const escaped = TEMPLATE_ESCAPES[next];
    if (escaped !== undefined) {
      literal += escaped;
    } else if (/[A-Za-z0-9]/.test(next)) {
      throw new SyntaxError(`Bad escape \\${next} in replacement`);
    } else {
      literal += ch + next;
    }
    i++;
  }

  flush();
  return tokens;
}

/**
 * Describe the capture groups of a compiled expression
 */
function captureGroups(regex: RegExp): { count: number; names: Set<string> } {
  // An empty alternative always matches, exposing the group layout
  const probe = new RegExp(`(?:${regex.source})|`, regex.flags.replace("g", "")).exec("");
  return {
    count: probe ? probe.length - 1 : 0,
    names: new Set(Object.keys(probe?.groups ?? {})),
  };
}

/**
 * Compile a stored rule
 * @throws SyntaxError if the pattern or the replacement is invalid
 */
export function compileCorrection(
  name: string,
  pattern: string,
  replacement: string
): CompiledCorrection {
  const { source, flags } = translatePattern(pattern);
  const regex = new RegExp(source, `gm${flags}`);
  const tokens = parseReplacement(replacement);
  const groups = captureGroups(regex);

  for (const token of tokens) {
    if (token.kind !== "group") continue;
    const known =
      typeof token.ref === "number" ? token.ref <= groups.count : groups.names.has(token.ref);
    if (!known) {
      throw new SyntaxError(`Invalid group reference ${token.ref}`);
    }
  }

  const render = (match: string, captures: unknown[], named: Record<string, unknown> | undefined): string =>
    tokens
      .map((token) => {
        if (token.kind === "literal") return token.text;
        if (token.ref === 0) return match;
        const value =
          typeof token.ref === "number" ? captures[token.ref - 1] : named?.[token.ref];
        // Unmatched groups substitute as empty text
        return typeof value === "string" ? value : "";
      })
      .join("");

  return {
    name,
    regex,
    apply(text: string): string {
      regex.lastIndex = 0;
      return text.replace(regex, (match: string, ...args: unknown[]) => {
        // args: ...captures, offset, input, [groups]
        const last = args[args.length - 1];
        const named = isJsonObject(last) ? last : undefined;
        const captures = args.slice(0, named ? args.length - 3 : args.length - 2);
        return render(match, captures, named);
      });
    },
  };
}
