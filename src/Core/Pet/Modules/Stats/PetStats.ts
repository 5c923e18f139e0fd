import type {
    CorePet_IGameState,
    CorePet_PetStat,
    CorePet_Stat,
} from '../../Game/PetGameState'

/**
 * CorePet_PetStats
 * Builds a fresh stat value from telemetry on every call.
 */
export class CorePet_PetStats {
    constructor(private readonly game: CorePet_IGameState) {}

    getStat(stat: CorePet_Stat): CorePet_PetStat {
        const raw = this.game.getStat(stat)
        return Object.freeze({ current: raw.current, total: raw.total })
    }
}
