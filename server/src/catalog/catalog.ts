/**
 * catalog.ts
 *
 * Read-only card catalog. The JSON document is keyed by numeric id; entries
 * are validated with zod once at load time and grouped by rarity so draws do
 * not filter the whole catalog on every request.
 */

import fs from 'node:fs';
import {z} from 'zod';
import {RARITIES, type CardDefinition, type Rarity} from '../../../shared/protocol/types/cards.js';
import {CatalogError} from '../errors.js';
import {info} from '../logging.js';
import {normalizeRarity, roleOf} from './rarity.js';

const localeTextSchema = z.object({
    name: z.string().trim().min(1).optional(),
    description: z.string().optional(),
});

const cardEntrySchema = z.object({
    name: z.string().trim().min(1),
    rarity: z.string().transform((value, ctx) => {
        const rarity = normalizeRarity(value);
        if (!rarity) {
            ctx.addIssue({code: z.ZodIssueCode.custom, message: `Unknown rarity "${value}"`});
            return z.NEVER;
        }
        return rarity;
    }),
    ovr: z.number().int().min(0),
    position: z.string().trim().default(''),
    country: z.string().optional(),
    image: z.string().optional(),
    text: z.record(localeTextSchema).default({}),
});

const catalogSchema = z.record(
    z.string().regex(/^\d+$/, {message: 'Catalog keys must be numeric ids'}),
    cardEntrySchema,
);

export type CatalogInput = z.input<typeof catalogSchema>;

export class CardCatalog {
    private readonly byRarity: Record<Rarity, CardDefinition[]>;

    private constructor(readonly cards: readonly CardDefinition[]) {
        this.byRarity = {common: [], rare: [], epic: [], legendary: [], mythic: []};
        for (const card of cards) {
            this.byRarity[card.rarity].push(card);
        }
    }

    static fromDocument(raw: unknown): CardCatalog {
        const parsed = catalogSchema.safeParse(raw);
        if (!parsed.success) {
            throw new CatalogError('Invalid card catalog', parsed.error.issues);
        }
        const cards: CardDefinition[] = Object.entries(parsed.data)
            .map(([key, entry]) => ({
                id: Number(key),
                name: entry.name,
                rarity: entry.rarity,
                ovr: entry.ovr,
                position: entry.position,
                role: roleOf(entry.position),
                country: entry.country,
                image: entry.image,
                text: entry.text,
            }))
            .sort((a, b) => a.id - b.id);
        if (cards.length === 0) {
            throw new CatalogError('Card catalog is empty');
        }
        return new CardCatalog(cards);
    }

    static loadFile(filePath: string): CardCatalog {
        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            throw new CatalogError(`Cannot read card catalog ${filePath}: ${reason}`);
        }
        const catalog = CardCatalog.fromDocument(raw);
        info(`[catalog] loaded ${catalog.size} cards`, catalog.countsByRarity());
        return catalog;
    }

    get size(): number {
        return this.cards.length;
    }

    get(id: number): CardDefinition | undefined {
        return this.cards.find((c) => c.id === id);
    }

    ofRarity(rarity: Rarity): readonly CardDefinition[] {
        return this.byRarity[rarity];
    }

    countsByRarity(): Record<Rarity, number> {
        const [common, rare, epic, legendary, mythic] = RARITIES.map((r) => this.byRarity[r].length);
        return {common, rare, epic, legendary, mythic};
    }
}
