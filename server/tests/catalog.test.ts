/**
 * catalog.test.ts
 *
 * Tests for catalog loading: alias normalization, validation failures and
 * the bundled catalog file.
 */

import {describe, it, expect} from 'vitest';
import {fileURLToPath} from 'node:url';
import {CardCatalog} from '../src/catalog/catalog.js';
import {CatalogError} from '../src/errors.js';
import {testCatalog} from './fixtures.js';

describe('CardCatalog.fromDocument', () => {
    it('normalizes localized rarity and position aliases', () => {
        const catalog = CardCatalog.fromDocument({
            '10': {name: 'Alias Keeper', rarity: '🟢 Редкая', ovr: 61, position: 'Вратарь'},
        });
        const card = catalog.get(10);
        expect(card?.rarity).toBe('rare');
        expect(card?.role).toBe('goalkeeper');
    });

    it('keeps cards with an unknown position but gives them no role', () => {
        const catalog = CardCatalog.fromDocument({
            '11': {name: 'Coach', rarity: 'common', ovr: 40, position: 'coach'},
        });
        expect(catalog.get(11)?.role).toBeNull();
    });

    it('rejects an unknown rarity', () => {
        expect(() => CardCatalog.fromDocument({
            '12': {name: 'Odd', rarity: 'shiny', ovr: 40, position: 'forward'},
        })).toThrow(CatalogError);
    });

    it('rejects non-numeric keys', () => {
        expect(() => CardCatalog.fromDocument({
            abc: {name: 'Odd', rarity: 'common', ovr: 40, position: 'forward'},
        })).toThrow(CatalogError);
    });

    it('rejects an empty catalog', () => {
        expect(() => CardCatalog.fromDocument({})).toThrow('Card catalog is empty');
    });

    it('groups cards by rarity', () => {
        expect(testCatalog().countsByRarity()).toEqual({common: 4, rare: 1, epic: 1, legendary: 0, mythic: 1});
    });
});

describe('CardCatalog.loadFile', () => {
    it('loads the bundled catalog with every tier populated', () => {
        const catalog = CardCatalog.loadFile(fileURLToPath(new URL('../config/catalog.json', import.meta.url)));
        expect(catalog.size).toBe(35);
        expect(catalog.countsByRarity()).toEqual({common: 12, rare: 9, epic: 7, legendary: 4, mythic: 3});
    });

    it('wraps unreadable files in a CatalogError', () => {
        expect(() => CardCatalog.loadFile('/nonexistent/catalog.json')).toThrow(CatalogError);
    });
});
