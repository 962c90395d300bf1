export { SequentialInterpolationEngine } from './SequentialInterpolationEngine';
export { InterpolationWindow } from './InterpolationWindow';
export {
    InterpolationStatus,
    EngineState,
    type InterpolationResult
} from './types';
