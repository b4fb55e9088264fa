export { validateLiveMode, LiveModeReport } from './validation';
