import type {
    CorePet_Location,
    CorePet_NpcInfo,
    CorePet_PetStat,
    CorePet_Stat,
} from './Game/PetGameState'
import type { CorePet_GearRef, CorePet_PetGear } from './Game/PetGear'
import type { CorePet_CooldownRef } from './Modules/Cooldown/CooldownTracker'
import type { CorePet_GearRequest } from './Modules/Gear/GearOverride'
import type { CorePet_LocatorListener } from './Modules/Locator/LocatorFeed'

/**
 * CorePet_PetAPI
 *
 * What behavior modules see of the hero's pet.
 *
 * The pet is deployed and repaired by the host tick loop only while
 * isEnabled() is true AND the user enabled the pet in the settings.
 */
export interface CorePet_PetAPI {
    /** Last value written through setEnabled, by any module */
    isEnabled(): boolean

    /**
     * Overwrite the shared enable flag.
     *
     * Every module should call this each cycle it runs. A module that
     * doesn't will inherit what the previous module set.
     */
    setEnabled(enabled: boolean): void

    /** Alive and on the map */
    isActive(): boolean

    isRepaired(): boolean

    getRepairCount(): number

    /** True if the hero has this gear equipped and it can be set */
    hasGear(gear: CorePet_GearRef): boolean

    /**
     * Gear currently set in-game. A setGear call is not necessarily
     * reflected here yet.
     */
    getGear(): CorePet_PetGear | null

    /**
     * Override the user-configured gear.
     *
     * Must be called repeatedly to keep the override; once calls stop,
     * the gear falls back to the user choice after the grace period.
     * Null falls back immediately.
     *
     * @throws CorePet_ItemNotEquippedError if the gear is not equipped
     */
    setGear(gear: CorePet_GearRef | null): void

    /** The requested gear, as opposed to the in-game one */
    getGearRequest(): CorePet_GearRequest

    hasCooldown(ref: CorePet_CooldownRef): boolean

    /** Locator ping target, null if unavailable */
    getLocatorNpcLoc(): CorePet_Location | null

    /** NPCs on the locator, empty if unavailable */
    getLocatorNpcs(): readonly CorePet_NpcInfo[]

    getStat(stat: CorePet_Stat): CorePet_PetStat

    /** Returns the unsubscribe function */
    onLocatorNpcListChange(listener: CorePet_LocatorListener): () => void
}

/**
 * CorePet_PetHostAPI
 * Extra surface the automation host and its tick actions use.
 */
export interface CorePet_PetHostAPI extends CorePet_PetAPI {
    /** Enable flag on and user preference on */
    isUsable(): boolean

    /**
     * Effective gear id: override, then gear selectors, then the
     * user default. Null leaves the in-game gear alone.
     */
    resolveGearId(): number | null
}
