/**
 * Split a command string into argv the way a POSIX shell would for plain
 * words: whitespace separates, single quotes are literal, double quotes allow
 * `\"`, `\\`, `\$` and `` \` `` escapes, a backslash outside quotes escapes the
 * next character. No expansion, globbing or operators.
 *
 * @throws Error on an unterminated quote or trailing backslash
 */
export function splitCommand(cmd: string): string[] {
  const args: string[] = [];
  let current = "";
  let inWord = false;
  let i = 0;

  while (i < cmd.length) {
    const ch = cmd[i];

    if (ch === "'") {
      const end = cmd.indexOf("'", i + 1);
      if (end === -1) throw new Error(`Unterminated single quote in command: ${cmd}`);
      current += cmd.slice(i + 1, end);
      inWord = true;
      i = end + 1;
      continue;
    }

    if (ch === '"') {
      i++;
      let closed = false;
      while (i < cmd.length) {
        const c = cmd[i];
        if (c === '"') {
          closed = true;
          i++;
          break;
        }
        if (c === "\\" && i + 1 < cmd.length && '"\\$`'.includes(cmd[i + 1])) {
          current += cmd[i + 1];
          i += 2;
          continue;
        }
        current += c;
        i++;
      }
      if (!closed) throw new Error(`Unterminated double quote in command: ${cmd}`);
      inWord = true;
      continue;
    }

    if (ch === "\\") {
      if (i + 1 >= cmd.length) throw new Error(`Trailing backslash in command: ${cmd}`);
      current += cmd[i + 1];
      inWord = true;
      i += 2;
      continue;
    }

    if (/\s/.test(ch)) {
      if (inWord) {
        args.push(current);
        current = "";
        inWord = false;
      }
      i++;
      continue;
    }

    current += ch;
    inWord = true;
    i++;
  }

  if (inWord) args.push(current);
  return args;
}
