import type { CorePet_TickContext } from '../../../TickContext'
import type { CorePet_DebugLog } from '../../Debug/DebugLog'
import { CorePet_AAction } from '../AAction'

/**
 * RepairAction:
 * Asks the game to repair a broken pet while it is usable.
 * The repair counter is kept by the game, not here.
 */
export class CorePet_RepairAction extends CorePet_AAction {
    protected readonly gate = 'usable'

    constructor(debug: CorePet_DebugLog, intervalMs: number = 1000) {
        super(debug, intervalMs)
    }

    protected update(ctx: CorePet_TickContext): void {
        if (ctx.game.isPetRepaired()) return

        this.issue('repair pet', () => ctx.commands.repairPet())
    }
}
