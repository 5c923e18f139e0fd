/**
 * External collaborators of the pet core.
 *
 * CorePet_IGameState is the raw truth read from the game.
 * CorePet_IGameCommands is how the tick loop asks the game to act.
 *
 * Neither is implemented here; the automation host provides them.
 */

export type CorePet_Stat = 'HP' | 'SHIELD' | 'FUEL' | 'XP' | 'HEAT'

export const CorePet_STATS: readonly CorePet_Stat[] = [
    'HP',
    'SHIELD',
    'FUEL',
    'XP',
    'HEAT',
]

export interface CorePet_PetStat {
    readonly current: number
    readonly total: number
}

export interface CorePet_Location {
    readonly x: number
    readonly y: number
}

/** An NPC listed by the pet locator. Identity is the id. */
export interface CorePet_NpcInfo {
    readonly id: number
    readonly name: string
    readonly health?: number
    readonly shield?: number
}

export interface CorePet_LocatorSnapshot {
    readonly npcs: readonly CorePet_NpcInfo[]
    readonly pingLocation: CorePet_Location | null
}

export interface CorePet_IGameState {
    /** Gear ids the hero currently has equipped for the pet */
    getEquippedGearIds(): readonly number[]

    /** Gear currently set in-game, null when unknown */
    getCurrentGearId(): number | null

    hasCooldown(cooldownId: number): boolean

    getStat(stat: CorePet_Stat): CorePet_PetStat

    /** Alive and on the map */
    isPetActive(): boolean

    isPetRepaired(): boolean

    getRepairCount(): number

    /** Null when the locator feature is unavailable */
    readLocator(): CorePet_LocatorSnapshot | null
}

export interface CorePet_IGameCommands {
    selectGear(gearId: number): void
    repairPet(): void
    setPetDeployed(deployed: boolean): void
}
