import { CorePet_gearById, CorePet_gearIdOf } from '../../Game/PetGear'
import type { CorePet_TickContext } from '../../TickContext'
import type { CorePet_CooldownTracker } from '../Cooldown/CooldownTracker'
import type { CorePet_GearOverride } from './GearOverride'
import type { CorePet_IGearSelector } from './IGearSelector'

export class CorePet_GearResolver {
    private selectors: CorePet_IGearSelector[] = []

    constructor(
        private readonly override: CorePet_GearOverride,
        private readonly cooldowns: CorePet_CooldownTracker,
        private readonly isEquipped: (gearId: number) => boolean,
        private readonly userGearId: () => number | null
    ) {}

    addSelector(selector: CorePet_IGearSelector): void {
        if (this.selectors.includes(selector)) return
        this.selectors.push(selector)
    }

    removeSelector(selector: CorePet_IGearSelector): void {
        this.selectors = this.selectors.filter((s) => s !== selector)
    }

    resolve(ctx: CorePet_TickContext): number | null {
        const request = this.override.current()
        if (request.kind === 'override') {
            return request.gearId
        }

        let bestId: number | null = null
        let bestScore = 0

        // Evaluate behavior selectors
        for (const selector of this.selectors) {
            const score = selector.score(ctx)
            // NaN fails every comparison and must never win
            if (!(score > bestScore)) continue

            const ref = selector.gear(ctx)
            if (ref === null) continue

            const id = CorePet_gearIdOf(ref)
            if (!this.isAvailable(id)) continue

            bestScore = score
            bestId = id
        }

        if (bestId !== null) return bestId

        // Nothing wants a gear -> user choice
        const userId = this.userGearId()
        if (userId !== null && this.isEquipped(userId)) {
            return userId
        }

        return null
    }

    /** Equipped and not cooling down */
    private isAvailable(gearId: number): boolean {
        if (!this.isEquipped(gearId)) return false

        const gear = CorePet_gearById(gearId)
        return !(gear && this.cooldowns.hasCooldown(gear))
    }
}
