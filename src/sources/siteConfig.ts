/**
 * src/sources/siteConfig.ts
 *
 * Site definitions from `config/sites.json`.
 *
 * Each entry names a crawler and the kind of board it is:
 *
 *   html → paginated HTML index + detail pages (two-phase crawl)
 *   api  → offset/limit JSON endpoint carrying whole records (single-phase)
 *
 * The file is validated up front; a typo in a selector map fails the CLI
 * before any request goes out.
 */

import * as fs from 'fs';
import { z } from 'zod';

const tableName = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain SQL identifier');

const siteBase = {
    name: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, 'lowercase letters, digits, "-" and "_" only'),
    /** Archive table; defaults to the crawler name with "-" turned into "_". */
    table: tableName.optional(),
};

export const HtmlSiteSchema = z.object({
    ...siteBase,
    kind: z.literal('html'),
    directoryUrl: z.string().url().refine((u) => u.includes('{page}'), 'must contain a {page} placeholder'),
    selectors: z.object({
        listingLink: z.string().min(1),
        title: z.string().min(1),
        company: z.string().optional(),
        location: z.string().optional(),
        description: z.string().optional(),
        salary: z.string().optional(),
        postedDate: z.string().optional(),
    }),
});

export const ApiSiteSchema = z.object({
    ...siteBase,
    kind: z.literal('api'),
    endpoint: z.string().url(),
    offsetParam: z.string().min(1).default('offset'),
    limitParam: z.string().min(1).default('limit'),
    /** Dot path to the array of records in the response body; empty for a bare array. */
    itemsPath: z.string().default(''),
    fields: z.object({
        url: z.string().min(1),
        title: z.string().min(1),
        company: z.string().optional(),
        location: z.string().optional(),
        description: z.string().optional(),
        salary: z.string().optional(),
        postedDate: z.string().optional(),
    }),
});

export const SiteSchema = z.discriminatedUnion('kind', [HtmlSiteSchema, ApiSiteSchema]);

export const SitesFileSchema = z.object({
    sites: z.array(SiteSchema),
}).superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.sites.forEach((site, index) => {
        if (seen.has(site.name)) {
            ctx.addIssue({ code: 'custom', path: ['sites', index, 'name'], message: `duplicate site '${site.name}'` });
        }
        seen.add(site.name);
    });
});

export type HtmlSite = z.infer<typeof HtmlSiteSchema>;
export type ApiSite = z.infer<typeof ApiSiteSchema>;
export type SiteDefinition = z.infer<typeof SiteSchema>;
export type SiteKind = SiteDefinition['kind'];

export function tableFor(site: SiteDefinition): string {
    return site.table ?? site.name.replace(/-/g, '_');
}

export function parseSites(raw: unknown): SiteDefinition[] {
    return SitesFileSchema.parse(raw).sites;
}

export function loadSites(filePath: string): SiteDefinition[] {
    if (!fs.existsSync(filePath)) {
        throw new Error(`Site config not found: ${filePath}`);
    }
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    return parseSites(raw);
}
