import { writeFile } from 'node:fs/promises';

export interface CaseResult {
  readonly name: string;
  readonly description: string;
  readonly passed: boolean;
  readonly diagnostics: readonly string[];
}

/**
 * Builds a TAP version 13 report, one line per case in the order recorded.
 */
export class TapReporter {
  private readonly results: CaseResult[] = [];

  public constructor(private readonly planned: number) {}

  public record(result: CaseResult): void {
    this.results.push(result);
  }

  public render(): string {
    const lines = ['TAP version 13', `1..${String(this.planned)}`];

    this.results.forEach((result, index) => {
      const status = result.passed ? 'ok' : 'not ok';
      lines.push(`${status} ${String(index + 1)} - ${result.name}: ${result.description}`);
      for (const diagnostic of result.diagnostics) {
        for (const line of diagnostic.split(/\r?\n/)) {
          lines.push(`# ${line}`);
        }
      }
    });

    return `${lines.join('\n')}\n`;
  }

  public async writeTo(path: string): Promise<void> {
    await writeFile(path, this.render(), 'utf8');
  }
}
