/**
 * cards.ts
 *
 * Read-only catalog endpoint. Sorted by name to produce stable output for
 * tests and clients.
 */

import type {FastifyInstance} from "fastify";
import type {CardCatalog} from "../catalog/catalog.js";

export async function registerCardRoutes(app: FastifyInstance, catalog: CardCatalog) {
    app.get("/api/cards", async (_req, reply) => {
        const cards = [...catalog.cards].sort((a, b) => a.name.localeCompare(b.name) || a.id - b.id);
        app.log.debug(`serving ${cards.length} card definitions`);
        return reply.send({ok: true, cards});
    });
}
