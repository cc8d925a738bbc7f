export { battleStates } from './battle-states.js';
