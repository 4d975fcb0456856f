export { LedgerService } from './LedgerService.js'
export type { ILedgerService, IntegrityStatus } from './ILedgerService.js'
