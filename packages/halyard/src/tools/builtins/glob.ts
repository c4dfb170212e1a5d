/**
 * Minimal glob support for tool filters: `*`, `**`, `?`, `[...]` and `{a,b}`.
 * Paths are matched with forward slashes.
 */

const cache = new Map<string, RegExp>();

function escapeRegExp(char: string): string {
  return /[.+^$()|\\]/.test(char) ? `\\${char}` : char;
}

/**
 * Compiles a glob to an anchored regular expression.
 *
 * @example
 * ```typescript
 * globToRegExp("src/**\/*.ts").test("src/a/b.ts"); // true
 * globToRegExp("*.{ts,tsx}").test("view.tsx");      // true
 * ```
 */
export function globToRegExp(glob: string): RegExp {
  const cached = cache.get(glob);
  if (cached) return cached;

  let source = "";
  let braceDepth = 0;
  for (let i = 0; i < glob.length; i++) {
    const char = glob[i];
    switch (char) {
      case "*":
        if (glob[i + 1] === "*") {
          // "**/" matches zero or more directories
          if (glob[i + 2] === "/") {
            source += "(?:.*/)?";
            i += 2;
          } else {
            source += ".*";
            i += 1;
          }
        } else {
          source += "[^/]*";
        }
        break;
      case "?":
        source += "[^/]";
        break;
      case "[": {
        const end = glob.indexOf("]", i + 1);
        if (end === -1) {
          source += "\\[";
        } else {
          const body = glob.slice(i + 1, end).replace(/^!/, "^").replace(/\\/g, "\\\\");
          source += `[${body}]`;
          i = end;
        }
        break;
      }
      case "{":
        braceDepth++;
        source += "(?:";
        break;
      case "}":
        if (braceDepth > 0) {
          braceDepth--;
          source += ")";
        } else {
          source += "\\}";
        }
        break;
      case ",":
        source += braceDepth > 0 ? "|" : ",";
        break;
      default:
        source += escapeRegExp(char);
    }
  }

  const regex = new RegExp(`^${source}$`);
  cache.set(glob, regex);
  return regex;
}

export function matchesGlob(path: string, glob: string): boolean {
  return globToRegExp(glob).test(path);
}

/**
 * Globs without a slash match the basename; others match the whole
 * relative path.
 */
export function matchesPathGlob(relativePath: string, glob: string): boolean {
  if (glob.includes("/")) {
    return matchesGlob(relativePath, glob);
  }
  const name = relativePath.slice(relativePath.lastIndexOf("/") + 1);
  return matchesGlob(name, glob);
}
