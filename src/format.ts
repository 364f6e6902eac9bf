const INTEGER_PATTERN = /^[+-]?\d+$/;

function formatVerb(verb: string, arg: string): string {
  switch (verb) {
    case "s":
    case "v":
      return arg;
    case "d":
      return INTEGER_PATTERN.test(arg) ? arg : `%!d(string=${arg})`;
    case "q":
      return JSON.stringify(arg);
    default:
      return `%!${verb}(string=${arg})`;
  }
}

/**
 * Positional printf-style substitution over string arguments.
 *
 * Never throws. A verb without an argument renders `%!s(MISSING)`, surplus
 * arguments are dropped and an unknown verb renders `%!x(string=arg)`.
 * Width, precision and flags are not supported.
 */
export function sprintf(template: string, args: readonly string[]): string {
  let out = "";
  let argIndex = 0;

  for (let i = 0; i < template.length; i += 1) {
    const ch = template.charAt(i);
    if (ch !== "%") {
      out += ch;
      continue;
    }

    if (i + 1 >= template.length) {
      out += "%!(NOVERB)";
      break;
    }

    i += 1;
    // A verb outside the BMP spans two UTF-16 units.
    const verb = String.fromCodePoint(template.codePointAt(i) ?? 0);
    i += verb.length - 1;
    if (verb === "%") {
      out += "%";
      continue;
    }

    const arg = args[argIndex];
    if (arg === undefined) {
      out += `%!${verb}(MISSING)`;
      continue;
    }
    argIndex += 1;
    out += formatVerb(verb, arg);
  }

  return out;
}
