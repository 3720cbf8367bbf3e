export { RedemptionService, RedemptionServiceDependencies } from './redemption.service';
export { RedemptionController } from './redemption.controller';
export { createRedemptionRoutes, createCodeAdminRoutes } from './redemption.routes';
export { RedemptionCode, CodeStatus, CodeType, RedemptionCodeSnapshot } from './redemption.code';
export { RedemptionRecord } from './redemption.record';
export * from './redemption.types';
