import type { CorePet_IGameState } from '../../Game/PetGameState'
import type { CorePet_Cooldown, CorePet_PetGear } from '../../Game/PetGear'

export type CorePet_CooldownRef = number | CorePet_Cooldown | CorePet_PetGear

/**
 * CorePet_CooldownTracker
 *
 * Pure reads of the live cooldown bits. Nothing is cached.
 * Object arguments resolve to the by-id query; a gear without a
 * cooldown answers false without touching game state.
 */
export class CorePet_CooldownTracker {
    constructor(private readonly game: CorePet_IGameState) {}

    hasCooldown(ref: CorePet_CooldownRef): boolean {
        if (typeof ref === 'number') {
            return this.game.hasCooldown(ref)
        }

        if ('cooldown' in ref) {
            return ref.cooldown !== null && this.game.hasCooldown(ref.cooldown.id)
        }

        return this.game.hasCooldown(ref.id)
    }
}
