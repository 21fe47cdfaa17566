export { dispatch } from './dispatch.js';
export type { Outcome, DispatchResult } from './dispatch.js';
export { renderOutcome, renderResponse, EXIT_MESSAGE } from './response.js';
export { Responder } from './responder.js';
export { InteractiveSession } from './interactive.js';
export type { SessionState, SessionEvent, SessionListener } from './interactive.js';
