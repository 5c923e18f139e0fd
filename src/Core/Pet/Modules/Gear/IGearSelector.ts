import type { CorePet_GearRef } from '../../Game/PetGear'
import type { CorePet_TickContext } from '../../TickContext'

/**
 * CorePet_IGearSelector:
 * - score(ctx): how strongly this behavior wants its gear right now.
 * - gear(ctx): the gear it wants, or null for none.
 *
 * GearResolver:
 * - ignores selectors while a module override is active
 * - picks the highest score above zero whose gear is usable
 * - first selector wins ties
 *
 * Selectors must not call ctx.pet.resolveGearId().
 */
export interface CorePet_IGearSelector {
    score: (ctx: CorePet_TickContext) => number
    gear: (ctx: CorePet_TickContext) => CorePet_GearRef | null
}
