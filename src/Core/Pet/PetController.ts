import { CorePet_describeGear, CorePet_defaultPetConfig } from './Config/PetConfig'
import type { CorePet_PetConfig } from './Config/PetConfig'
import type {
    CorePet_IGameCommands,
    CorePet_IGameState,
    CorePet_Location,
    CorePet_NpcInfo,
    CorePet_PetStat,
    CorePet_Stat,
} from './Game/PetGameState'
import { CorePet_gearById, CorePet_gearIdOf } from './Game/PetGear'
import type { CorePet_GearRef, CorePet_PetGear } from './Game/PetGear'
import type { CorePet_AAction } from './Modules/Action/AAction'
import { CorePet_ApplyGearAction } from './Modules/Action/Actions/ApplyGearAction'
import { CorePet_DeployAction } from './Modules/Action/Actions/DeployAction'
import { CorePet_RepairAction } from './Modules/Action/Actions/RepairAction'
import { CorePet_CooldownTracker } from './Modules/Cooldown/CooldownTracker'
import type { CorePet_CooldownRef } from './Modules/Cooldown/CooldownTracker'
import { CorePet_DebugLog } from './Modules/Debug/DebugLog'
import { CorePet_EnableArbiter } from './Modules/Enable/EnableArbiter'
import { CorePet_GearOverride } from './Modules/Gear/GearOverride'
import type { CorePet_GearRequest } from './Modules/Gear/GearOverride'
import { CorePet_GearResolver } from './Modules/Gear/GearResolver'
import type { CorePet_IGearSelector } from './Modules/Gear/IGearSelector'
import { CorePet_LocatorFeed } from './Modules/Locator/LocatorFeed'
import type { CorePet_LocatorListener } from './Modules/Locator/LocatorFeed'
import { CorePet_LocatorSensor } from './Modules/Perception/Sensors/LocatorSensor'
import { CorePet_PetStats } from './Modules/Stats/PetStats'
import type { CorePet_PetHostAPI } from './PetAPI'
import type { CorePet_TickContext } from './TickContext'

export interface CorePet_ControllerOptions {
    game: CorePet_IGameState
    commands: CorePet_IGameCommands
    config?: CorePet_PetConfig
    /** Ms clock; defaults to Date.now */
    clock?: () => number
}

/**
 * CorePet_PetController
 *
 * One per host session.
 *
 * Responsibilities:
 * - The PetAPI surface handed to behavior modules
 * - Arbitration: enable flag, gear lease, gear selectors
 * - Host tick: locator ingestion, deploy, repair, gear apply
 *
 * Does NOT:
 * - Read or write the game directly (game state / commands do)
 * - Run timers; every expiry is evaluated on read
 */
export class CorePet_PetController implements CorePet_PetHostAPI {
    public readonly debug: CorePet_DebugLog

    private readonly game: CorePet_IGameState
    private readonly commands: CorePet_IGameCommands
    private readonly clock: () => number
    private config: CorePet_PetConfig

    private readonly arbiter: CorePet_EnableArbiter
    private readonly override: CorePet_GearOverride
    private readonly cooldowns: CorePet_CooldownTracker
    private readonly resolver: CorePet_GearResolver
    private readonly stats: CorePet_PetStats
    private readonly locator: CorePet_LocatorFeed
    private readonly locatorSensor: CorePet_LocatorSensor
    private readonly actions: readonly CorePet_AAction[]

    constructor(options: CorePet_ControllerOptions) {
        this.game = options.game
        this.commands = options.commands
        this.clock = options.clock ?? Date.now
        this.config = options.config ?? CorePet_defaultPetConfig()

        const intervals = this.config.intervals
        const isEquipped = (gearId: number) =>
            this.game.getEquippedGearIds().includes(gearId)

        this.debug = new CorePet_DebugLog(this.config.debug)
        this.arbiter = new CorePet_EnableArbiter(this.debug)
        this.override = new CorePet_GearOverride(
            this.clock,
            isEquipped,
            this.debug,
            this.config.gearGraceMs
        )
        this.cooldowns = new CorePet_CooldownTracker(this.game)
        this.resolver = new CorePet_GearResolver(
            this.override,
            this.cooldowns,
            isEquipped,
            () => this.config.userGearId
        )
        this.stats = new CorePet_PetStats(this.game)
        this.locator = new CorePet_LocatorFeed(this.debug)
        this.locatorSensor = new CorePet_LocatorSensor(
            this.locator,
            intervals.locatorMs
        )
        this.actions = [
            new CorePet_RepairAction(this.debug, intervals.repairMs),
            new CorePet_DeployAction(this.debug, intervals.deployMs),
            new CorePet_ApplyGearAction(this.debug, intervals.gearMs),
        ]

        this.debug.log(
            `controller ready (user pet ${this.config.userPetEnabled ? 'on' : 'off'}, ` +
                `gear ${CorePet_describeGear(this.config.userGearId)}, ` +
                `grace ${this.config.gearGraceMs}ms)`
        )
    }

    /* ------------------------------------------------------------
     * Enable arbiter
     * ------------------------------------------------------------ */

    isEnabled(): boolean {
        return this.arbiter.isEnabled()
    }

    setEnabled(enabled: boolean): void {
        this.arbiter.setEnabled(enabled)
    }

    isUsable(): boolean {
        return this.arbiter.isUsable(this.config.userPetEnabled)
    }

    setUserPetEnabled(enabled: boolean): void {
        this.config = { ...this.config, userPetEnabled: enabled }
    }

    /* ------------------------------------------------------------
     * Pet status (live reads)
     * ------------------------------------------------------------ */

    isActive(): boolean {
        return this.game.isPetActive()
    }

    isRepaired(): boolean {
        return this.game.isPetRepaired()
    }

    getRepairCount(): number {
        return this.game.getRepairCount()
    }

    getStat(stat: CorePet_Stat): CorePet_PetStat {
        return this.stats.getStat(stat)
    }

    /* ------------------------------------------------------------
     * Gear
     * ------------------------------------------------------------ */

    hasGear(gear: CorePet_GearRef): boolean {
        return this.game.getEquippedGearIds().includes(CorePet_gearIdOf(gear))
    }

    getGear(): CorePet_PetGear | null {
        const id = this.game.getCurrentGearId()
        return id === null ? null : CorePet_gearById(id)
    }

    setGear(gear: CorePet_GearRef | null): void {
        if (gear === null) {
            this.override.release()
            return
        }
        this.override.request(CorePet_gearIdOf(gear))
    }

    getGearRequest(): CorePet_GearRequest {
        return this.override.current()
    }

    /** Ms left on the gear override lease */
    getGearOverrideRemaining(): number {
        return this.override.getTimeRemaining()
    }

    setGearGracePeriod(ms: number): void {
        this.override.setGracePeriod(ms)
        this.config = { ...this.config, gearGraceMs: ms }
    }

    addGearSelector(selector: CorePet_IGearSelector): void {
        this.resolver.addSelector(selector)
    }

    removeGearSelector(selector: CorePet_IGearSelector): void {
        this.resolver.removeSelector(selector)
    }

    resolveGearId(): number | null {
        return this.resolver.resolve(this.context())
    }

    /* ------------------------------------------------------------
     * Cooldowns
     * ------------------------------------------------------------ */

    hasCooldown(ref: CorePet_CooldownRef): boolean {
        return this.cooldowns.hasCooldown(ref)
    }

    /* ------------------------------------------------------------
     * Locator
     * ------------------------------------------------------------ */

    getLocatorNpcLoc(): CorePet_Location | null {
        return this.locator.getLocatorNpcLoc()
    }

    getLocatorNpcs(): readonly CorePet_NpcInfo[] {
        return this.locator.getLocatorNpcs()
    }

    onLocatorNpcListChange(listener: CorePet_LocatorListener): () => void {
        return this.locator.onNpcListChange(listener)
    }

    /* ------------------------------------------------------------
     * Host lifecycle
     * ------------------------------------------------------------ */

    /** One host cycle. Call only while the bot is running. */
    tick(): void {
        const ctx = this.context()

        this.locatorSensor.tick(ctx)
        for (const action of this.actions) {
            action.tick(ctx)
        }
    }

    /** New session: flag off, no override, no locator data. */
    reset(): void {
        this.arbiter.reset()
        this.override.reset()
        this.locator.reset()
        this.locatorSensor.reset()
        for (const action of this.actions) {
            action.reset()
        }
    }

    private context(): CorePet_TickContext {
        return {
            pet: this,
            game: this.game,
            commands: this.commands,
            usable: this.isUsable(),
            time: this.clock(),
        }
    }
}
