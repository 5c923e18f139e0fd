import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'

import { CorePet_defaultPetConfig } from '../../../src/Core/Pet/Config/PetConfig'
import { CorePet_ItemNotEquippedError } from '../../../src/Core/Pet/Errors/ItemNotEquippedError'
import { CorePet_Cooldowns, CorePet_PetGears } from '../../../src/Core/Pet/Game/PetGear'
import type { CorePet_IGearSelector } from '../../../src/Core/Pet/Modules/Gear/IGearSelector'
import type { CorePet_LocatorNpcListChangeEvent } from '../../../src/Core/Pet/Modules/Locator/LocatorFeed'
import { CorePet_PetController } from '../../../src/Core/Pet/PetController'
import type { CorePet_TickContext } from '../../../src/Core/Pet/TickContext'
import { FakeClock, FakeGame, npc } from './helpers'

describe('pet controller', () => {
    let game: FakeGame
    let clock: FakeClock
    let pet: CorePet_PetController

    beforeEach(() => {
        game = new FakeGame()
        clock = new FakeClock()
        pet = new CorePet_PetController({ game, commands: game, clock: clock.read })
    })

    afterEach(() => {
        vi.restoreAllMocks()
    })

    describe('enable arbiter', () => {
        test('defaults to disabled', () => {
            expect(pet.isEnabled()).toBe(false)
        })

        test('last write wins', () => {
            for (const value of [true, false, true, true, false]) {
                pet.setEnabled(value)
            }
            expect(pet.isEnabled()).toBe(false)

            pet.setEnabled(true)
            expect(pet.isEnabled()).toBe(true)
        })

        test('usable needs both the flag and the user preference', () => {
            expect(pet.isUsable()).toBe(false)

            pet.setEnabled(true)
            expect(pet.isUsable()).toBe(true)

            pet.setUserPetEnabled(false)
            expect(pet.isUsable()).toBe(false)
            expect(pet.isEnabled()).toBe(true)
        })
    })

    describe('gear', () => {
        beforeEach(() => {
            game.equipped = [1, 2, 7]
            game.currentGear = 1
        })

        test('hasGear accepts ids and gears', () => {
            expect(pet.hasGear(2)).toBe(true)
            expect(pet.hasGear(CorePet_PetGears.KAMIKAZE)).toBe(true)
            expect(pet.hasGear(CorePet_PetGears.GUARD)).toBe(true)
            expect(pet.hasGear(CorePet_PetGears.AUTO_LOOT)).toBe(false)
        })

        test('getGear reflects the in-game gear', () => {
            expect(pet.getGear()).toBe(CorePet_PetGears.PASSIVE)

            game.currentGear = null
            expect(pet.getGear()).toBeNull()

            game.currentGear = 99
            expect(pet.getGear()).toBeNull()
        })

        test('request is visible through getGearRequest, not getGear', () => {
            pet.setGear(7)

            expect(pet.getGearRequest()).toEqual({ kind: 'override', gearId: 7 })
            expect(pet.getGear()).toBe(CorePet_PetGears.PASSIVE)
        })

        test('setGear accepts a gear object', () => {
            pet.setGear(CorePet_PetGears.GUARD)
            expect(pet.getGearRequest()).toEqual({ kind: 'override', gearId: 2 })
        })

        test('setGear(null) relinquishes immediately', () => {
            pet.setGear(7)
            pet.setGear(null)
            expect(pet.getGearRequest()).toEqual({ kind: 'default' })
        })

        test('unequipped gear throws and keeps the previous override', () => {
            pet.setGear(2)
            expect(() => pet.setGear(CorePet_PetGears.MEGA_MINE)).toThrow(
                CorePet_ItemNotEquippedError
            )
            expect(pet.getGearRequest()).toEqual({ kind: 'override', gearId: 2 })
        })

        test('override lapses after the grace period', () => {
            pet.setGear(7)
            clock.advance(4900)
            expect(pet.getGearRequest().kind).toBe('override')
            expect(pet.getGearOverrideRemaining()).toBe(100)

            clock.advance(200)
            expect(pet.getGearRequest()).toEqual({ kind: 'default' })
        })

        test('grace period can be changed at run time', () => {
            pet.setGearGracePeriod(1000)
            pet.setGear(7)
            clock.advance(1001)
            expect(pet.getGearRequest()).toEqual({ kind: 'default' })
            expect(() => pet.setGearGracePeriod(-1)).toThrow(RangeError)
        })
    })

    describe('gear resolution', () => {
        const selector = (score: number, gear: number | null): CorePet_IGearSelector => ({
            score: () => score,
            gear: () => gear,
        })

        beforeEach(() => {
            game.equipped = [1, 2, 5]
        })

        test('falls back to the user gear', () => {
            expect(pet.resolveGearId()).toBe(CorePet_PetGears.PASSIVE.id)
        })

        test('null when the user gear is not equipped', () => {
            game.equipped = [2]
            expect(pet.resolveGearId()).toBeNull()
        })

        test('highest scoring selector wins', () => {
            pet.addGearSelector(selector(10, 2))
            pet.addGearSelector(selector(50, 5))
            expect(pet.resolveGearId()).toBe(5)
        })

        test('selectors with a cooling down or unequipped gear are skipped', () => {
            pet.addGearSelector(selector(10, 2))
            pet.addGearSelector(selector(50, 5))
            pet.addGearSelector(selector(90, 7))
            game.cooldowns.add(CorePet_Cooldowns.ENEMY_LOCATOR.id)

            expect(pet.resolveGearId()).toBe(2)
        })

        test('zero scores are ignored', () => {
            pet.addGearSelector(selector(0, 2))
            expect(pet.resolveGearId()).toBe(1)
        })

        test('a NaN score never wins', () => {
            pet.addGearSelector(selector(90, 2))
            pet.addGearSelector(selector(Number.NaN, 5))
            pet.addGearSelector(selector(1, 1))
            expect(pet.resolveGearId()).toBe(2)
        })

        test('a lone NaN score falls back to the user gear', () => {
            pet.addGearSelector(selector(Number.NaN, 5))
            expect(pet.resolveGearId()).toBe(1)
        })

        test('ties go to the first selector', () => {
            pet.addGearSelector(selector(10, 2))
            pet.addGearSelector(selector(10, 5))
            expect(pet.resolveGearId()).toBe(2)
        })

        test('module override beats selectors', () => {
            pet.addGearSelector(selector(100, 5))
            pet.setGear(2)
            expect(pet.resolveGearId()).toBe(2)
        })

        test('removed selectors no longer apply', () => {
            const s = selector(10, 2)
            pet.addGearSelector(s)
            pet.removeGearSelector(s)
            expect(pet.resolveGearId()).toBe(1)
        })

        test('selectors see the tick context', () => {
            const seen: CorePet_TickContext[] = []
            pet.addGearSelector({
                score: (ctx) => {
                    seen.push(ctx)
                    return 1
                },
                gear: () => 2,
            })
            clock.advance(1234)
            pet.setEnabled(true)

            pet.resolveGearId()

            expect(seen).toHaveLength(1)
            expect(seen[0].time).toBe(1234)
            expect(seen[0].usable).toBe(true)
            expect(seen[0].pet).toBe(pet)
        })
    })

    describe('cooldowns', () => {
        test('by id, by cooldown and by gear', () => {
            game.cooldowns.add(CorePet_Cooldowns.KAMIKAZE.id)

            expect(pet.hasCooldown(CorePet_Cooldowns.KAMIKAZE.id)).toBe(true)
            expect(pet.hasCooldown(CorePet_Cooldowns.KAMIKAZE)).toBe(true)
            expect(pet.hasCooldown(CorePet_PetGears.KAMIKAZE)).toBe(true)
            expect(pet.hasCooldown(CorePet_PetGears.COMBO_REPAIR)).toBe(false)
        })

        test('gear without a cooldown never reads game state', () => {
            expect(pet.hasCooldown(CorePet_PetGears.GUARD)).toBe(false)
            expect(game.cooldownReads).toBe(0)
        })

        test('reads are live', () => {
            expect(pet.hasCooldown(3)).toBe(false)
            game.cooldowns.add(3)
            expect(pet.hasCooldown(3)).toBe(true)
        })
    })

    describe('status and stats', () => {
        test('status is read from the game', () => {
            game.active = true
            game.repaired = false
            game.repairCount = 4

            expect(pet.isActive()).toBe(true)
            expect(pet.isRepaired()).toBe(false)
            expect(pet.getRepairCount()).toBe(4)
        })

        test('stats are read on every call', () => {
            game.stats.set('FUEL', { current: 40, total: 100 })
            const first = pet.getStat('FUEL')
            expect(first).toEqual({ current: 40, total: 100 })
            expect(Object.isFrozen(first)).toBe(true)

            game.stats.set('FUEL', { current: 35, total: 100 })
            expect(pet.getStat('FUEL')).toEqual({ current: 35, total: 100 })
            expect(first.current).toBe(40)
        })
    })

    describe('tick', () => {
        test('deploys a usable pet', () => {
            pet.setEnabled(true)
            pet.tick()
            expect(game.commands).toEqual([{ type: 'setPetDeployed', deployed: true }])
        })

        test('does nothing when the user disabled the pet', () => {
            pet.setUserPetEnabled(false)
            pet.setEnabled(true)
            pet.tick()
            expect(game.commands).toEqual([])
        })

        test('undeploys when no longer enabled', () => {
            game.active = true
            pet.tick()
            expect(game.commands).toEqual([{ type: 'setPetDeployed', deployed: false }])
        })

        test('repairs before deploying', () => {
            game.repaired = false
            pet.setEnabled(true)
            pet.tick()
            expect(game.commands).toEqual([{ type: 'repairPet' }])
        })

        test('actions are throttled on tick time', () => {
            game.repaired = false
            pet.setEnabled(true)

            pet.tick()
            clock.advance(500)
            pet.tick()
            clock.advance(500)
            pet.tick()

            expect(game.commands).toEqual([{ type: 'repairPet' }, { type: 'repairPet' }])
        })

        test('applies the override gear', () => {
            game.active = true
            game.equipped = [1, 2, 7]
            game.currentGear = 1
            pet.setEnabled(true)
            pet.setGear(7)

            pet.tick()

            expect(game.commands).toEqual([{ type: 'selectGear', gearId: 7 }])
        })

        test('leaves the gear alone while the pet is off the map', () => {
            game.active = false
            game.repaired = false
            game.equipped = [1, 7]
            game.currentGear = 1
            pet.setEnabled(true)
            pet.setGear(7)

            pet.tick()

            expect(game.commands).toEqual([{ type: 'repairPet' }])
        })

        test('gear action runs on the first tick the pet is deployed', () => {
            game.equipped = [1, 7]
            game.currentGear = 1
            pet.setEnabled(true)
            pet.setGear(7)

            pet.tick()
            expect(game.commands).toEqual([{ type: 'setPetDeployed', deployed: true }])

            game.active = true
            clock.advance(10)
            pet.tick()
            expect(game.commands).toEqual([
                { type: 'setPetDeployed', deployed: true },
                { type: 'selectGear', gearId: 7 },
            ])
        })

        test('user gear "none" leaves the in-game gear alone', () => {
            const config = { ...CorePet_defaultPetConfig(), userGearId: null }
            const quiet = new CorePet_PetController({ game, commands: game, config, clock: clock.read })
            game.active = true
            game.equipped = [1, 2]
            game.currentGear = 2
            quiet.setEnabled(true)

            quiet.tick()

            expect(quiet.resolveGearId()).toBeNull()
            expect(game.commands).toEqual([])
        })

        test('skips a gear that is cooling down', () => {
            game.active = true
            game.equipped = [1, 7]
            game.currentGear = 1
            game.cooldowns.add(CorePet_Cooldowns.KAMIKAZE.id)
            pet.setEnabled(true)
            pet.setGear(7)

            pet.tick()

            expect(game.commands).toEqual([])
        })

        test('reverts to the user gear once the override lapses', () => {
            game.active = true
            game.equipped = [1, 2]
            game.currentGear = 2
            pet.setEnabled(true)
            pet.setGear(2)

            pet.tick()
            expect(game.commands).toEqual([])

            clock.advance(5100)
            pet.tick()

            expect(game.commands).toEqual([{ type: 'selectGear', gearId: 1 }])
        })

        test('feeds the locator on its own interval', () => {
            const events: CorePet_LocatorNpcListChangeEvent[] = []
            pet.onLocatorNpcListChange((e) => events.push(e))

            game.locator = { npcs: [npc(1, 'A')], pingLocation: { x: 10, y: 20 } }
            pet.tick()
            expect(pet.getLocatorNpcs()).toEqual([npc(1, 'A')])
            expect(pet.getLocatorNpcLoc()).toEqual({ x: 10, y: 20 })

            game.locator = { npcs: [npc(2, 'B')], pingLocation: null }
            clock.advance(100)
            pet.tick()
            expect(pet.getLocatorNpcs()).toEqual([npc(1, 'A')])

            clock.advance(400)
            pet.tick()
            expect(pet.getLocatorNpcs()).toEqual([npc(2, 'B')])
            expect(events.map((e) => e.locatorNpcs.map((n) => n.id))).toEqual([[1], [2]])
        })
    })

    test('reset starts a clean session', () => {
        game.equipped = [2]
        game.locator = { npcs: [npc(1, 'A')], pingLocation: { x: 1, y: 1 } }
        pet.setEnabled(true)
        pet.setGear(2)
        pet.tick()

        pet.reset()

        expect(pet.isEnabled()).toBe(false)
        expect(pet.getGearRequest()).toEqual({ kind: 'default' })
        expect(pet.getLocatorNpcs()).toEqual([])
        expect(pet.getLocatorNpcLoc()).toBeNull()
    })

    test('debug config traces to the console', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => {})
        const config = { ...CorePet_defaultPetConfig(), debug: true }
        const traced = new CorePet_PetController({ game, commands: game, config, clock: clock.read })

        traced.setEnabled(true)
        traced.setEnabled(true)

        expect(log.mock.calls).toEqual([
            ['[pet] controller ready (user pet on, gear PASSIVE, grace 5000ms)'],
            ['[pet] enabled false -> true'],
        ])
    })
})
