import type { CorePet_IGameCommands, CorePet_IGameState } from './Game/PetGameState'
import type { CorePet_PetHostAPI } from './PetAPI'

/**
 * CorePet_TickContext:
 * Per-tick context passed to sensors, actions and gear selectors.
 *
 * Sensors/actions must ONLY:
 * - read from ctx.game / ctx.pet
 * - act through ctx.commands
 *
 * Sensors/actions must NOT:
 * - write the enable flag or the gear override (modules own those)
 */
export interface CorePet_TickContext {
    pet: CorePet_PetHostAPI

    /** Raw game state */
    game: CorePet_IGameState

    commands: CorePet_IGameCommands

    /** isUsable() sampled at the start of the tick */
    usable: boolean

    /** Unified tick time (controller clock) */
    time: number
}
