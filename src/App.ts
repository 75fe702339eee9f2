import {
    World,
    Ticker,
    SimulationController,
    PhysicsConfig,
    SimulationConfig,
    CentralBody,
    Orbit,
    createOrbitSystem,
    createSceneRenderer,
    type InputSource,
    type RenderSurface,
    type PhysicsConstants,
    type SimulationSettings
} from './ECS/index.js'
import { loadGalacticCenterScene, type SceneEntities } from './scene.js'
import { AppLog } from './AppLog.js'

export interface AppOptions {
    surface: RenderSurface
    input: InputSource
    config?: SimulationSettings
    constants?: PhysicsConstants
}

export default class App {
    readonly world: World
    readonly controller: SimulationController
    readonly scene: SceneEntities
    private ticker: Ticker
    private input: InputSource

    constructor({ surface, input, config = SimulationConfig, constants = PhysicsConfig }: AppOptions) {
        AppLog.info('App initialization started')

        this.world = new World(config.timeScale.initial)
        this.world.registerSystems([
            createOrbitSystem({ constants, solver: config.solver }),
            createSceneRenderer(surface, config)
        ])
        this.scene = loadGalacticCenterScene(this.world, config, constants)
        this.controller = new SimulationController(this.world, config)
        this.ticker = new Ticker(config.frameRate, () => this.controller.frame())
        this.input = input

        this.logScene(constants)
        AppLog.info(`App initialization complete (systems: ${this.world.getSystemNames().join(', ')})`)
    }

    /**
     * Runs the frame loop until a quit event arrives.
     */
    run(): Promise<void> {
        return new Promise(resolve => {
            this.controller.onQuit(() => {
                this.ticker.stop()
                this.input.close()
                AppLog.info('Simulation stopped')
                resolve()
            })
            this.input.onEvent(event => this.controller.handle(event))
            this.ticker.start()
            AppLog.info('Simulation started')
        })
    }

    private logScene(constants: PhysicsConstants): void {
        const central = this.world.getComponent(this.scene.centralBody, CentralBody)
        if (central) {
            AppLog.info(
                `Central body: ${(central.mass / constants.solarMass).toExponential(3)} solar masses, ` +
                `Schwarzschild radius ${(central.schwarzschildRadius / 1000).toFixed(0)} km, ` +
                `spin parameter ${(central.spinParameter / 1000).toFixed(0)} km`
            )
        }
        for (const id of this.scene.orbiters) {
            const orbit = this.world.getComponent(id, Orbit)
            if (!orbit) continue
            const { semiMajorAxis, eccentricity, period, periapsis, apoapsis } = orbit.elements
            AppLog.info(
                `Orbit: a=${(semiMajorAxis / constants.AU).toFixed(1)} AU, e=${eccentricity}, ` +
                `P=${(period / constants.julianYear).toFixed(2)} yr, ` +
                `periapsis ${(periapsis / constants.AU).toFixed(1)} AU, apoapsis ${(apoapsis / constants.AU).toFixed(1)} AU`
            )
        }
    }
}
