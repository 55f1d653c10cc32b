export { createTrackerApp } from './http'
export { handleUpdateRequest, toWireResponse } from './update-tracked-branch'
export type { HandlerResult } from './update-tracked-branch'
