import { plainToInstance } from 'class-transformer';
import { Contains, IsOptional, IsString, Matches, validateSync } from 'class-validator';

import { SUMMARY_MARKER } from '../config/activity.config.js';
import { ParseError } from './activity.errors.js';
import { parseIsoDate } from './dates.js';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const FENCED_JSON_RE = /```json\n([\s\S]*?)\n```/g;
const FOOTER_SPLIT_RE = /\n*---\n\n<details>[\s\S]*$/;

/**
 * Metadata appended to every published summary. Field names are snake_case
 * because they are read back from earlier posts.
 */
export class SummaryFooterDto {
  @IsOptional()
  @Matches(ISO_DATE)
  start_date?: string;

  @Matches(ISO_DATE)
  end_date!: string;

  @IsString()
  @Contains(SUMMARY_MARKER)
  powered_by!: string;

  @IsOptional()
  @IsString()
  llm?: string;
}

export interface SummaryFooter {
  start_date?: string;
  end_date: string; // last day covered
  powered_by: string;
  llm?: string;
}

/**
 * Reads the footer of a published summary. Throws ParseError when the post
 * has no fenced JSON block, the JSON is malformed, or it lacks our marker.
 */
export function extractSummaryFooter(body: string): SummaryFooter {
  const normalized = body.replace(/\r\n/g, '\n');
  const blocks = [...normalized.matchAll(FENCED_JSON_RE)];
  const last = blocks[blocks.length - 1];
  if (!last) throw new ParseError('footer', null, 'no fenced JSON block');

  let json: unknown;
  try {
    json = JSON.parse(last[1]);
  } catch (error: unknown) {
    throw new ParseError('footer', last[1], error instanceof Error ? error.message : 'invalid JSON');
  }
  if (json === null || typeof json !== 'object' || Array.isArray(json)) {
    throw new ParseError('footer', json, 'expected a JSON object');
  }

  const dto = plainToInstance(SummaryFooterDto, json);
  const errors = validateSync(dto);
  if (errors.length > 0) {
    const fields = errors.map((e) => e.property).join(', ');
    throw new ParseError('footer', json, `invalid ${fields}`);
  }
  parseIsoDate('footer.end_date', dto.end_date);

  return {
    ...(dto.start_date != null ? { start_date: dto.start_date } : {}),
    end_date: dto.end_date,
    powered_by: dto.powered_by,
    ...(dto.llm != null ? { llm: dto.llm } : {}),
  };
}

export function isPublishedSummary(body: string | null | undefined): boolean {
  if (!body) return false;
  try {
    extractSummaryFooter(body);
    return true;
  } catch (error: unknown) {
    if (error instanceof ParseError) return false;
    throw error;
  }
}

export function renderSummaryFooter(footer: SummaryFooter): string {
  return [
    '---',
    '',
    '<details><summary></summary>',
    '',
    '```json',
    JSON.stringify(footer, null, 4),
    '```',
    '</details>',
  ].join('\n');
}

export function appendSummaryFooter(summary: string, footer: SummaryFooter): string {
  return `${summary.trim()}\n\n${renderSummaryFooter(footer)}\n`;
}

/** The post body without its metadata footer. */
export function stripSummaryFooter(body: string): string {
  return body.replace(/\r\n/g, '\n').replace(FOOTER_SPLIT_RE, '').trim();
}
