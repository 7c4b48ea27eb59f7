export { EstimatePipeline, createRunSignal } from "./estimate/pipeline.js";
export type {
  EstimatePipelineDeps,
  EstimateRunOptions,
  EstimateRunResult,
  PreparedEstimate,
  ValidatedEstimate,
  ValidationItem,
  ValidationSummary
} from "./estimate/pipeline.js";
export { buildEstimatePipeline, createSessionFactory, createSowMapper } from "./estimate/factory.js";
export { SchemaRegistry, loadSchemaRegistry, resolveSchemasPath, BUNDLED_SCHEMAS_PATH } from "./estimate/schema/registry.js";
export { validateServiceRequest } from "./estimate/schema/validator.js";
export type { FieldSchema, ServiceRequest, ServiceSchema, ValidatedConfig } from "./estimate/schema/types.js";
export { SessionOrchestrator } from "./estimate/orchestrator/sessionOrchestrator.js";
export type { ItemOutcome, OrchestrationResult, OrchestratorState } from "./estimate/orchestrator/types.js";
export { aggregateReport, describeReport } from "./estimate/report/aggregator.js";
export type { EstimateReport, ReportStatus, ServiceTally } from "./estimate/report/aggregator.js";
export { createDefaultConfigurators } from "./estimate/configurators/defaults.js";
export { defineFormConfigurator } from "./estimate/configurators/formConfigurator.js";
export type { Configurator, ConfiguratorRegistry } from "./estimate/configurators/base.js";
export { MockCalculatorSession, MockSessionFactory } from "./estimate/session/mockSession.js";
export { PlaywrightSessionFactory } from "./estimate/session/playwrightSession.js";
export type { CalculatorSession, SessionFactory } from "./estimate/session/types.js";
export { LlmSowMapper, SowNormalizer } from "./estimate/input/sowMapper.js";
export type { SowMapper } from "./estimate/input/sowMapper.js";
export { normalizeServiceName } from "./estimate/input/serviceNames.js";
export { EstimateClient, EstimateServiceError } from "./client/estimateClient.js";
export { createEstimateService } from "./service/estimate/server.js";
export { loadSettings } from "./shared/config/settings.js";
export type { Settings } from "./shared/config/settings.js";
export * from "./shared/errors/estimateErrors.js";
