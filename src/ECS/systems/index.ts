export { createOrbitSystem, propagateOrbit, type OrbitSample, type OrbitSystemOptions } from './OrbitSystem.js'
export {
    createSceneRenderer,
    composeFrame,
    type FrameView,
    type RenderSurface,
    type CentralBodyView,
    type OrbiterView
} from './SceneRenderer.js'
