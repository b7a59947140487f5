function safeReplacer() {
  const seen = new WeakSet<object>();
  return (_key: string, item: unknown): unknown => {
    if (typeof item === 'bigint') {
      return item.toString();
    }
    if (item instanceof Error) {
      return { name: item.name, message: item.message };
    }
    if (item && typeof item === 'object') {
      if (seen.has(item)) {
        return '[Circular]';
      }
      seen.add(item);
    }
    return item;
  };
}

export function stringifyForOutput(value: unknown): string {
  return JSON.stringify(value, safeReplacer(), 2);
}

export function writeJsonLine(stream: Pick<typeof process.stdout, 'write'>, value: unknown): void {
  stream.write(`${stringifyForOutput(value)}\n`);
}
