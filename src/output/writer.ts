import { appendFileSync, existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import type { Logger } from '../logger';
import type { DealerData } from '../types';
import { buildDealerBlock, buildRunHeader, type TemplateOptions } from './template';

/** The single Markdown report. Dealer blocks are separated by one blank line. */
export class MarkdownWriter {
  constructor(
    readonly outputFile: string,
    private readonly template: TemplateOptions,
    private readonly logger: Logger
  ) {
    mkdirSync(path.dirname(outputFile), { recursive: true });
  }

  /** Truncates the report and writes a fresh run header. */
  startRun(): void {
    this.atomicWrite(`${buildRunHeader(this.template)}\n`);
  }

  appendDealer(dealer: DealerData): void {
    if (!existsSync(this.outputFile)) this.startRun();
    appendFileSync(this.outputFile, this.blocks([dealer]), 'utf-8');
    this.logger.debug(`Appended ${dealer.website} to ${this.outputFile}`);
  }

  writeAll(dealers: DealerData[], includeHeader = true): void {
    const header = includeHeader ? `${buildRunHeader(this.template)}\n` : '';
    this.atomicWrite(header + this.blocks(dealers));
    this.logger.info(`Wrote ${dealers.length} dealer(s) to ${this.outputFile}`);
  }

  content(): string {
    return existsSync(this.outputFile) ? readFileSync(this.outputFile, 'utf-8') : '';
  }

  private blocks(dealers: DealerData[]): string {
    return dealers.map((d) => `${buildDealerBlock(d, this.template)}\n\n`).join('');
  }

  private atomicWrite(content: string): void {
    const tmp = path.join(
      path.dirname(this.outputFile),
      `.tmp_${process.pid}_${Date.now()}_${path.basename(this.outputFile)}`
    );
    try {
      writeFileSync(tmp, content, 'utf-8');
      renameSync(tmp, this.outputFile);
    } catch (err) {
      rmSync(tmp, { force: true });
      throw err;
    }
  }
}
