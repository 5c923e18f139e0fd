/**
 * Pet configuration
 *
 * Read from a TOML file (default ./pet.toml). A missing file means
 * defaults; a file that fails to parse warns and falls back to defaults.
 * Individual keys with the wrong type warn and keep their default.
 */

import { existsSync, readFileSync } from 'node:fs'
import * as TOML from '@iarna/toml'

import { CorePet_gearById, CorePet_gearByName, CorePet_PetGears } from '../Game/PetGear'
import { CorePet_DEFAULT_GEAR_GRACE_MS } from '../Modules/Gear/GearOverride'

export interface CorePet_IntervalConfig {
    locatorMs: number
    deployMs: number
    repairMs: number
    gearMs: number
}

export interface CorePet_PetConfig {
    debug: boolean
    /** The user's own pet switch; gates the enable flag */
    userPetEnabled: boolean
    /** Gear used when no override or selector applies */
    userGearId: number | null
    gearGraceMs: number
    intervals: CorePet_IntervalConfig
}

export const CorePet_DEFAULT_CONFIG_FILE = 'pet.toml'

export function CorePet_defaultPetConfig(): CorePet_PetConfig {
    return {
        debug: false,
        userPetEnabled: true,
        userGearId: CorePet_PetGears.PASSIVE.id,
        gearGraceMs: CorePet_DEFAULT_GEAR_GRACE_MS,
        intervals: {
            locatorMs: 500,
            deployMs: 1000,
            repairMs: 1000,
            gearMs: 250,
        },
    }
}

type Table = Record<string, unknown>

function isTable(value: unknown): value is Table {
    return (
        typeof value === 'object' &&
        value !== null &&
        !Array.isArray(value) &&
        !(value instanceof Date)
    )
}

/**
 * Parse TOML content into a config.
 * @throws on TOML syntax errors
 */
export function CorePet_parsePetConfig(
    content: string,
    source: string = CorePet_DEFAULT_CONFIG_FILE
): CorePet_PetConfig {
    const parsed: Table = TOML.parse(content)
    const config = CorePet_defaultPetConfig()

    const warn = (key: string, detail: string) =>
        console.warn(`Warning: ${source}: ${key} ${detail}, using default.`)

    const section = (name: string): Table => {
        const value = parsed[name]
        if (value === undefined) return {}
        if (isTable(value)) return value
        warn(name, 'is not a table')
        return {}
    }

    const bool = (table: Table, key: string, name: string, fallback: boolean): boolean => {
        const value = table[key]
        if (value === undefined) return fallback
        if (typeof value === 'boolean') return value
        warn(name, 'must be true or false')
        return fallback
    }

    const positive = (table: Table, key: string, name: string, fallback: number): number => {
        const value = table[key]
        if (value === undefined) return fallback
        if (typeof value === 'number' && Number.isFinite(value) && value > 0) return value
        warn(name, 'must be a positive number')
        return fallback
    }

    config.debug = bool(parsed, 'debug', 'debug', config.debug)

    const pet = section('pet')
    config.userPetEnabled = bool(pet, 'enabled', 'pet.enabled', config.userPetEnabled)
    config.userGearId = readGear(pet['gear'], config.userGearId, (d) => warn('pet.gear', d))

    const override = section('override')
    config.gearGraceMs = positive(override, 'grace_ms', 'override.grace_ms', config.gearGraceMs)

    const intervals = section('intervals')
    const d = config.intervals
    config.intervals = {
        locatorMs: positive(intervals, 'locator_ms', 'intervals.locator_ms', d.locatorMs),
        deployMs: positive(intervals, 'deploy_ms', 'intervals.deploy_ms', d.deployMs),
        repairMs: positive(intervals, 'repair_ms', 'intervals.repair_ms', d.repairMs),
        gearMs: positive(intervals, 'gear_ms', 'intervals.gear_ms', d.gearMs),
    }

    return config
}

/** Gear by name or numeric id; "none" clears the user gear. */
function readGear(
    value: unknown,
    fallback: number | null,
    warn: (detail: string) => void
): number | null {
    if (value === undefined) return fallback

    if (typeof value === 'number') {
        if (Number.isInteger(value) && value > 0) return value
        warn('must be a positive integer id')
        return fallback
    }

    if (typeof value === 'string') {
        if (value.trim().toLowerCase() === 'none') return null

        const gear = CorePet_gearByName(value)
        if (gear) return gear.id
        warn(`names an unknown gear "${value}"`)
        return fallback
    }

    warn('must be a gear name or id')
    return fallback
}

/**
 * Load config from disk, falling back to defaults.
 */
export function CorePet_loadPetConfig(
    path: string = CorePet_DEFAULT_CONFIG_FILE
): CorePet_PetConfig {
    if (!existsSync(path)) {
        return CorePet_defaultPetConfig()
    }

    try {
        return CorePet_parsePetConfig(readFileSync(path, 'utf-8'), path)
    } catch (err) {
        console.warn(
            `Warning: Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`
        )
        console.warn('Falling back to default pet config.')
        return CorePet_defaultPetConfig()
    }
}

/** Display name for a configured gear id */
export function CorePet_describeGear(gearId: number | null): string {
    if (gearId === null) return 'none'
    return CorePet_gearById(gearId)?.name ?? String(gearId)
}
