import { CorePet_gearById } from '../../../Game/PetGear'
import type { CorePet_TickContext } from '../../../TickContext'
import type { CorePet_DebugLog } from '../../Debug/DebugLog'
import { CorePet_AAction } from '../AAction'

/**
 * ApplyGearAction:
 * Converges the in-game gear towards the effective gear.
 *
 * Leaves the game alone when there is no effective gear or while the
 * target gear is cooling down.
 */
export class CorePet_ApplyGearAction extends CorePet_AAction {
    protected readonly gate = 'deployed'

    constructor(debug: CorePet_DebugLog, intervalMs: number = 250) {
        super(debug, intervalMs)
    }

    protected update(ctx: CorePet_TickContext): void {
        const target = ctx.pet.resolveGearId()
        if (target === null) return
        if (ctx.game.getCurrentGearId() === target) return

        const gear = CorePet_gearById(target)
        if (gear && ctx.pet.hasCooldown(gear)) return

        this.issue(`select gear ${gear?.name ?? target}`, () =>
            ctx.commands.selectGear(target)
        )
    }
}
