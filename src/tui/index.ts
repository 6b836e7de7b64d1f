export { FoodLogController, OVERVIEW_HELP, FORM_HELP } from './controller.js';
export type { ViewState, KeyOutcome, ControllerOptions, ControllerSnapshot } from './controller.js';
export { FormBuffer, FORM_FIELDS, FIELD_COUNT, parseSubmission } from './form.js';
export type { FieldKey, FormValues } from './form.js';
export { runEventLoop } from './loop.js';
export type { EventSource, LoopExit } from './loop.js';
