import type { CorePet_TickContext } from '../../../TickContext'
import type { CorePet_LocatorFeed } from '../../Locator/LocatorFeed'
import { CorePet_ASensor } from './ASensor'

/**
 * LocatorSensor:
 * Pulls the raw locator list and ping from the game and hands it to
 * the feed, which does the change detection.
 */
export class CorePet_LocatorSensor extends CorePet_ASensor {
    constructor(
        private readonly feed: CorePet_LocatorFeed,
        intervalMs: number = 500
    ) {
        super(intervalMs)
    }

    protected update(ctx: CorePet_TickContext): void {
        this.feed.ingest(ctx.game.readLocator())
    }
}
