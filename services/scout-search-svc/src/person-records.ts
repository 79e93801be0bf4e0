import { z } from 'zod';

import type { PersonRecord } from './types.js';

const experienceSchema = z
  .object({
    title: z.string().nullish(),
    company_name: z.string().nullish(),
    date_to: z.string().nullish(),
    is_current: z.union([z.boolean(), z.number()]).nullish()
  })
  .passthrough();

function pickString(raw: Record<string, unknown>, ...keys: string[]): string | null {
  for (const key of keys) {
    const value = raw[key];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value.trim();
    }
  }
  return null;
}

/** Backend ids arrive as numbers or strings; both map to the same record id. */
export function extractRecordId(raw: Record<string, unknown>): string | null {
  for (const key of ['id', 'member_id', 'employee_id']) {
    const value = raw[key];
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
    if (typeof value === 'string' && value.trim().length > 0) {
      return value.trim();
    }
  }
  return null;
}

function currentExperience(raw: Record<string, unknown>): { title: string | null; organization: string | null } {
  const parsed = z.array(z.unknown()).safeParse(raw.experience);
  if (!parsed.success) {
    return { title: null, organization: null };
  }

  const entries = parsed.data.flatMap((entry) => {
    const result = experienceSchema.safeParse(entry);
    return result.success ? [result.data] : [];
  });
  const current = entries.find((entry) => Boolean(entry.is_current) || !entry.date_to) ?? entries[0];

  return {
    title: current?.title?.trim() || null,
    organization: current?.company_name?.trim() || null
  };
}

export function normalizeProfileUrl(value: string | null): string | null {
  if (!value) {
    return null;
  }
  const withScheme = /^https?:\/\//i.test(value) ? value : `https://${value}`;
  return withScheme.replace(/^http:\/\//i, 'https://').replace(/\/+$/, '');
}

/** Returns null for documents without a usable id; those cannot be deduplicated. */
export function toPersonRecord(raw: Record<string, unknown>): PersonRecord | null {
  const recordId = extractRecordId(raw);
  if (!recordId) {
    return null;
  }

  const experience = currentExperience(raw);
  return {
    recordId,
    fullName: pickString(raw, 'full_name', 'name'),
    headline: pickString(raw, 'headline', 'generated_headline'),
    currentTitle: pickString(raw, 'job_title', 'active_experience_title') ?? experience.title,
    currentOrganization: pickString(raw, 'company_name', 'active_experience_company_name') ?? experience.organization,
    location: pickString(raw, 'location', 'location_full'),
    profileUrl: normalizeProfileUrl(pickString(raw, 'linkedin_url', 'professional_network_url', 'websites_linkedin')),
    raw
  };
}
