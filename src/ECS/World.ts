import {
    Name,
    Position,
    CentralBody,
    Orbit,
    OrbitState,
    Trail,
    CameraComponent
} from './Components.js'
import type { ComponentKey, ComponentTypes, EntityId } from './Components.js'
import type { System } from './System.js'
import { SimulationConfig } from './SimulationConfig.js'

/**
 * Simulated-time clock shared by the controller and the visual systems.
 */
export interface SimulationClock {
    /** Simulated seconds advanced per step */
    timeScale: number
    paused: boolean
}

type ComponentStorage = {
    [K in ComponentKey]: Map<EntityId, ComponentTypes[K]>
}

/**
 * Cached query result with dirty tracking
 */
interface QueryCache {
    entities: EntityId[]
    dirty: boolean
}

/**
 * ECS World with symbol-keyed component storage and query caching.
 *
 * Features:
 * - Type-safe component access via symbols
 * - Query caching with invalidation on component insertion
 * - Dual update passes (simulation step + visual frame)
 */
export class World {
    private nextEntityId: EntityId = 0
    private entities = new Set<EntityId>()
    private components: ComponentStorage

    // Query cache: key is sorted component descriptions joined
    private queryCache = new Map<string, QueryCache>()

    // Systems
    private simulationSystems: System[] = []
    private visualSystems: System[] = []

    readonly clock: SimulationClock

    constructor(timeScale: number = SimulationConfig.timeScale.initial) {
        this.clock = { timeScale, paused: false }
        this.components = createStorage()
    }

    // ==================== Stepping ====================

    /**
     * Advance every simulation system by `dt` simulated seconds.
     */
    step(dt: number): void {
        for (const system of this.simulationSystems) {
            system.update(this, dt)
        }
    }

    updateVisuals(dt: number): void {
        for (const system of this.visualSystems) {
            system.update(this, dt)
        }
    }

    // ==================== Entity Management ====================

    createEntity(): EntityId {
        const id = this.nextEntityId++
        this.entities.add(id)
        return id
    }

    getEntityCount(): number {
        return this.entities.size
    }

    // ==================== Component Management ====================

    addComponent<K extends ComponentKey>(
        entity: EntityId,
        key: K,
        value: ComponentTypes[K]
    ): void {
        if (!this.entities.has(entity)) {
            throw new Error(`Unknown entity: ${entity}`)
        }
        const storage = this.components[key]
        const isNew = !storage.has(entity)
        storage.set(entity, value)

        if (isNew) {
            this.invalidateCachesForComponent(key)
        }
    }

    getComponent<K extends ComponentKey>(
        entity: EntityId,
        key: K
    ): ComponentTypes[K] | undefined {
        return this.components[key].get(entity)
    }

    hasComponent<K extends ComponentKey>(entity: EntityId, key: K): boolean {
        return this.components[key].has(entity)
    }

    // ==================== Query Caching ====================

    private getCacheKey(keys: ComponentKey[]): string {
        // Sort by symbol description for consistent keys
        return keys.map(k => k.description || String(k)).sort().join('|')
    }

    private invalidateCachesForComponent(component: ComponentKey): void {
        const compName = component.description || String(component)
        for (const [key, cache] of this.queryCache) {
            if (key.split('|').includes(compName)) {
                cache.dirty = true
            }
        }
    }

    // ==================== Queries ====================

    /**
     * Query entities that have ALL specified components, in creation order.
     */
    query(...keys: ComponentKey[]): EntityId[] {
        if (keys.length === 0) {
            return Array.from(this.entities)
        }

        const cacheKey = this.getCacheKey(keys)
        const cache = this.queryCache.get(cacheKey)

        if (cache && !cache.dirty) {
            // Return a copy to prevent callers from corrupting the cache
            return cache.entities.slice()
        }

        const result = Array.from(this.entities).filter(id =>
            keys.every(key => this.hasComponent(id, key))
        )

        if (cache) {
            cache.entities = result
            cache.dirty = false
        } else {
            this.queryCache.set(cacheKey, { entities: result, dirty: false })
        }

        return result.slice()
    }

    /**
     * Query for a single entity with the specified components.
     * Useful for singleton components like Camera.
     */
    querySingle(...keys: ComponentKey[]): EntityId | undefined {
        return this.query(...keys)[0]
    }

    // ==================== System Management ====================

    registerSystem(system: System): void {
        system.init?.(this)

        if (system.phase === 'visual') {
            this.visualSystems.push(system)
        } else {
            this.simulationSystems.push(system)
        }
    }

    registerSystems(systems: System[]): void {
        for (const system of systems) {
            this.registerSystem(system)
        }
    }

    getSystemNames(): string[] {
        return [...this.simulationSystems, ...this.visualSystems].map(s => s.name)
    }
}

function createStorage(): ComponentStorage {
    return {
        [Name]: new Map(),
        [Position]: new Map(),
        [CentralBody]: new Map(),
        [Orbit]: new Map(),
        [OrbitState]: new Map(),
        [Trail]: new Map(),
        [CameraComponent]: new Map()
    }
}
