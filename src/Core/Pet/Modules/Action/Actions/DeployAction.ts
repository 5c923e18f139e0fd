import type { CorePet_TickContext } from '../../../TickContext'
import type { CorePet_DebugLog } from '../../Debug/DebugLog'
import { CorePet_AAction } from '../AAction'

/**
 * DeployAction:
 * Keeps the pet on the map while usable and off it otherwise.
 * A broken pet is left to RepairAction first.
 */
export class CorePet_DeployAction extends CorePet_AAction {
    protected readonly gate = 'always'

    constructor(debug: CorePet_DebugLog, intervalMs: number = 1000) {
        super(debug, intervalMs)
    }

    protected update(ctx: CorePet_TickContext): void {
        const active = ctx.game.isPetActive()
        if (ctx.usable === active) return

        if (!ctx.usable) {
            this.issue('undeploy pet', () => ctx.commands.setPetDeployed(false))
            return
        }

        if (!ctx.game.isPetRepaired()) return
        this.issue('deploy pet', () => ctx.commands.setPetDeployed(true))
    }
}
