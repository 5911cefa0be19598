/**
 * Output contracts
 *
 * A contract names required fields and their types. JSON contracts parse the
 * provider content (a fenced ```json block is accepted); text contracts
 * require non-empty content and check their fields against { content }.
 */

import { z } from 'zod';
import type { Contract, FieldType } from './types';

export type ContractResult = { ok: true; json?: Record<string, unknown> } | { ok: false; violations: string[] };

const FIELD_SCHEMAS: Record<FieldType, z.ZodTypeAny> = {
  string: z.string(),
  number: z.number(),
  boolean: z.boolean(),
  array: z.array(z.unknown()),
  object: z.record(z.unknown()),
};

const FENCED = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/i;

function contractSchemaFor(contract: Contract) {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [field, type] of Object.entries(contract.fields)) {
    shape[field] = FIELD_SCHEMAS[type];
  }
  return z.object(shape).passthrough();
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    if (issue.code === z.ZodIssueCode.invalid_type) {
      if (issue.received === 'undefined') return `missing required field "${path}"`;
      return path
        ? `field "${path}": expected ${issue.expected}, received ${issue.received}`
        : `response: expected ${issue.expected}, received ${issue.received}`;
    }
    return path ? `field "${path}": ${issue.message}` : issue.message;
  });
}

export function stripFences(content: string): string {
  const trimmed = content.trim();
  const fenced = FENCED.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}

export function validateContract(contract: Contract, content: string): ContractResult {
  if (contract.format === 'text') {
    if (content.trim().length === 0) {
      return { ok: false, violations: ['content: empty response'] };
    }
    const result = contractSchemaFor(contract).safeParse({ content });
    return result.success ? { ok: true } : { ok: false, violations: describeIssues(result.error) };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripFences(content));
  } catch {
    return { ok: false, violations: ['content: not valid JSON'] };
  }

  const result = contractSchemaFor(contract).safeParse(parsed);
  if (!result.success) {
    return { ok: false, violations: describeIssues(result.error) };
  }
  return { ok: true, json: result.data };
}
