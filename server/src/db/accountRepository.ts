/**
 * accountRepository.ts
 *
 * better-sqlite3 implementation of `AccountRepository`. A save rewrites one
 * account row and its collection inside a single transaction, so the file
 * always holds the latest committed state of every account.
 */

import type {Statement, Transaction} from 'better-sqlite3';
import {z} from 'zod';
import type {Account} from '../../../shared/protocol/types/account.js';
import {RARITIES, ROLES, type OwnedCard} from '../../../shared/protocol/types/cards.js';
import type {AccountRepository} from '../accounts/repository.js';
import type {SqliteDatabase} from './sqlite.js';

const accountRowSchema = z.object({
    id: z.number().int(),
    display_name: z.string().nullable(),
    coins: z.number().int(),
    gems: z.number().int(),
    candies: z.number().int(),
    stars: z.number().int(),
    free_packs: z.number().int(),
    last_refill_at: z.number(),
    rating: z.number().int(),
    next_card_id: z.number().int(),
    dice_wins: z.number().int(),
    dice_losses: z.number().int(),
    dice_total: z.number().int(),
    created_at: z.number(),
});

const cardRowSchema = z.object({
    account_id: z.number().int(),
    id: z.number().int(),
    definition_id: z.number().int(),
    name: z.string(),
    rarity: z.enum(RARITIES),
    ovr: z.number().int(),
    role: z.enum(ROLES).nullable(),
    acquired_at: z.string(),
    media_ref: z.string().nullable(),
});

export class SqliteAccountRepository implements AccountRepository {
    private readonly upsertAccountStmt: Statement;
    private readonly deleteCardsStmt: Statement;
    private readonly insertCardStmt: Statement;
    private readonly saveTx: Transaction<(accounts: Account[]) => void>;

    constructor(private readonly db: SqliteDatabase) {
        this.upsertAccountStmt = db.prepare(`
  INSERT INTO accounts (id, display_name, coins, gems, candies, stars, free_packs, last_refill_at,
                        rating, next_card_id, dice_wins, dice_losses, dice_total, created_at)
  VALUES (@id, @display_name, @coins, @gems, @candies, @stars, @free_packs, @last_refill_at,
          @rating, @next_card_id, @dice_wins, @dice_losses, @dice_total, @created_at)
  ON CONFLICT(id) DO UPDATE SET
    display_name = excluded.display_name, coins = excluded.coins, gems = excluded.gems,
    candies = excluded.candies, stars = excluded.stars, free_packs = excluded.free_packs,
    last_refill_at = excluded.last_refill_at, rating = excluded.rating,
    next_card_id = excluded.next_card_id, dice_wins = excluded.dice_wins,
    dice_losses = excluded.dice_losses, dice_total = excluded.dice_total
`);
        this.deleteCardsStmt = db.prepare(`DELETE FROM cards WHERE account_id = ?`);
        this.insertCardStmt = db.prepare(`
  INSERT INTO cards (account_id, id, slot, definition_id, name, rarity, ovr, role, acquired_at, media_ref)
  VALUES (@account_id, @id, @slot, @definition_id, @name, @rarity, @ovr, @role, @acquired_at, @media_ref)
`);
        this.saveTx = db.transaction((accounts: Account[]) => {
            for (const account of accounts) {
                this.writeAccount(account);
            }
        });
    }

    private writeAccount(account: Account): void {
        this.upsertAccountStmt.run({
            id: account.id,
            display_name: account.displayName,
            coins: account.balances.coins,
            gems: account.balances.gems,
            candies: account.balances.candies,
            stars: account.balances.stars,
            free_packs: account.freePacks,
            last_refill_at: account.lastRefillAt,
            rating: account.rating,
            next_card_id: account.nextCardId,
            dice_wins: account.diceWins,
            dice_losses: account.diceLosses,
            dice_total: account.diceTotal,
            created_at: account.createdAt,
        });
        this.deleteCardsStmt.run(account.id);
        account.collection.forEach((card, slot) => {
            this.insertCardStmt.run({
                account_id: account.id,
                id: card.id,
                slot,
                definition_id: card.definitionId,
                name: card.name,
                rarity: card.rarity,
                ovr: card.ovr,
                role: card.role,
                acquired_at: card.acquiredAt,
                media_ref: card.mediaRef ?? null,
            });
        });
    }

    loadAll(): Account[] {
        const accountRows = z.array(accountRowSchema).parse(this.db.prepare(`SELECT * FROM accounts ORDER BY id`).all());
        const cardRows = z.array(cardRowSchema).parse(
            this.db.prepare(`SELECT * FROM cards ORDER BY account_id, slot`).all(),
        );

        const collections = new Map<number, OwnedCard[]>();
        for (const row of cardRows) {
            const card: OwnedCard = {
                id: row.id,
                definitionId: row.definition_id,
                name: row.name,
                rarity: row.rarity,
                ovr: row.ovr,
                role: row.role,
                acquiredAt: row.acquired_at,
            };
            if (row.media_ref !== null) card.mediaRef = row.media_ref;
            const list = collections.get(row.account_id) ?? [];
            list.push(card);
            collections.set(row.account_id, list);
        }

        return accountRows.map((row) => ({
            id: row.id,
            displayName: row.display_name,
            balances: {coins: row.coins, gems: row.gems, candies: row.candies, stars: row.stars},
            collection: collections.get(row.id) ?? [],
            freePacks: row.free_packs,
            lastRefillAt: row.last_refill_at,
            rating: row.rating,
            nextCardId: row.next_card_id,
            diceWins: row.dice_wins,
            diceLosses: row.dice_losses,
            diceTotal: row.dice_total,
            createdAt: row.created_at,
        }));
    }

    save(...accounts: Account[]): void {
        this.saveTx(accounts);
    }

    ping(): boolean {
        try {
            return this.db.prepare(`SELECT 1 AS ok`).pluck().get() === 1;
        } catch {
            return false;
        }
    }

    close(): void {
        this.db.close();
    }
}
