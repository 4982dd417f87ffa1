/**
 * Persona Catalog (config/personas.json)
 *
 * Loaded once, validated with zod, immutable afterwards. Unknown or missing
 * persona ids resolve to the catalog default.
 */

import * as fs from 'fs'
import { z } from 'zod'

const PersonaSchema = z.object({
    id: z.string().min(1).transform(id => id.trim().toLowerCase()),
    name: z.string().min(1),
    identity: z.string().default('Professional weather assistant'),
    tone: z.string().default('concise and factual'),
    vocabulary: z.string().default('plain language'),
    humorStyle: z.string().default('none'),
    riskStance: z.string().default('balanced'),
    styleRules: z.array(z.string()).default([]),
    /** Prefix prepended to every answer, e.g. "Safety briefing:" */
    label: z.string().optional(),
    /** One-line note appended when any risk keyword appears in the answer */
    actionNote: z.string().optional(),
    riskKeywords: z.array(z.string().transform(k => k.toLowerCase())).default([]),
    rephraseCurrentConditions: z.boolean().default(false),
})

const CatalogSchema = z.object({
    defaultPersona: z.string().min(1),
    personas: z.array(PersonaSchema).min(1),
}).refine(
    catalog => catalog.personas.some(p => p.id === catalog.defaultPersona),
    { message: 'defaultPersona must name one of the personas' },
)

export type Persona = Readonly<z.infer<typeof PersonaSchema>>

export interface PersonaSummary {
    id: string
    name: string
    identity: string
    tone: string
}

export interface PersonaCatalog {
    defaultPersonaId: string
    personas: ReadonlyMap<string, Persona>
}

const CATALOG_PATH = new URL('../../config/personas.json', import.meta.url)

let catalog: PersonaCatalog | null = null

export function parsePersonaCatalog(raw: unknown): PersonaCatalog {
    const parsed = CatalogSchema.parse(raw)
    return {
        defaultPersonaId: parsed.defaultPersona,
        personas: new Map(parsed.personas.map(p => [p.id, Object.freeze(p)])),
    }
}

export function loadPersonaCatalog(): PersonaCatalog {
    if (!catalog) {
        const raw: unknown = JSON.parse(fs.readFileSync(CATALOG_PATH, 'utf-8'))
        catalog = parsePersonaCatalog(raw)
        console.log(`[persona] Loaded ${catalog.personas.size} personas`)
    }
    return catalog
}

export function defaultPersonaId(source: PersonaCatalog = loadPersonaCatalog()): string {
    return source.defaultPersonaId
}

export function resolvePersona(personaId: string | null | undefined, source: PersonaCatalog = loadPersonaCatalog()): Persona {
    const key = (personaId ?? '').trim().toLowerCase()
    const found = key ? source.personas.get(key) : undefined
    if (found) return found

    const fallback = source.personas.get(source.defaultPersonaId)
    if (!fallback) throw new Error(`Default persona '${source.defaultPersonaId}' missing from catalog`)
    return fallback
}

export function listPersonas(source: PersonaCatalog = loadPersonaCatalog()): PersonaSummary[] {
    return [...source.personas.values()].map(p => ({
        id: p.id,
        name: p.name,
        identity: p.identity,
        tone: p.tone,
    }))
}
