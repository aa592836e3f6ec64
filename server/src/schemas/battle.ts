/**
 * battle.ts
 *
 * Request body for a battle against a scripted opponent.
 */

import {z} from "zod";
import {SCRIPTED_LEVELS} from "../battle/resolver.js";

export const scriptedBattleSchema = z.object({
    level: z.enum(SCRIPTED_LEVELS),
});
