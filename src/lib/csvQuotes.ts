type QuoteState = 'fieldStart' | 'unquoted' | 'quoted' | 'quotePending' | 'strayTail';

/**
 * Rewrites a quoted field with text after its closing quote, such as
 * `"OVER $500"X`, into a well-formed field (`"OVER $500X"`). The CSV parser
 * would otherwise keep searching for a closing quote and fold every following
 * record into that one field.
 *
 * Works on chunks, so state carries across chunk boundaries. Records are
 * counted from 0 (the header), so `repairedRecords` holds 1-based data rows.
 */
export class StrayQuoteRepairer {
  private state: QuoteState = 'fieldStart';
  private record = 0;
  readonly repairedRecords: number[] = [];

  write(chunk: string): string {
    let out = '';
    for (const ch of chunk) {
      switch (this.state) {
        case 'fieldStart':
          out += ch;
          if (ch === '"') this.state = 'quoted';
          else if (ch === '\n') this.record += 1;
          else if (ch !== ',' && ch !== '\r') this.state = 'unquoted';
          break;
        case 'unquoted':
          out += ch;
          if (ch === '\n') this.record += 1;
          if (ch === ',' || ch === '\n' || ch === '\r') this.state = 'fieldStart';
          break;
        case 'quoted':
          if (ch === '"') this.state = 'quotePending';
          else out += ch;
          break;
        case 'quotePending':
          if (ch === '"') {
            out += '""';
            this.state = 'quoted';
          } else if (ch === ',' || ch === '\n' || ch === '\r') {
            out += `"${ch}`;
            if (ch === '\n') this.record += 1;
            this.state = 'fieldStart';
          } else {
            this.markRepaired();
            out += ch;
            this.state = 'strayTail';
          }
          break;
        case 'strayTail':
          if (ch === ',' || ch === '\n' || ch === '\r') {
            out += `"${ch}`;
            if (ch === '\n') this.record += 1;
            this.state = 'fieldStart';
          } else {
            out += ch === '"' ? '""' : ch;
          }
          break;
      }
    }
    return out;
  }

  /** Closes a field left open by the last chunk. An unterminated quoted field is left as is. */
  end(): string {
    const tail = this.state === 'quotePending' || this.state === 'strayTail' ? '"' : '';
    this.state = 'fieldStart';
    return tail;
  }

  private markRepaired(): void {
    if (this.repairedRecords[this.repairedRecords.length - 1] !== this.record) {
      this.repairedRecords.push(this.record);
    }
  }
}

export async function* repairStrayQuotes(
  input: string | AsyncIterable<string>,
  repairer: StrayQuoteRepairer,
): AsyncGenerator<string> {
  const chunks = typeof input === 'string' ? [input] : input;
  for await (const chunk of chunks) {
    const out = repairer.write(chunk);
    if (out) yield out;
  }
  const tail = repairer.end();
  if (tail) yield tail;
}
