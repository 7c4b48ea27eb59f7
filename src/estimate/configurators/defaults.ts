import type { Configurator, ConfiguratorRegistry } from "./base.js";
import type { FormConfiguratorOptions } from "./formConfigurator.js";
import { createAlbConfigurator } from "./services/alb.js";
import { createApiGatewayConfigurator } from "./services/apiGateway.js";
import { createCloudWatchConfigurator } from "./services/cloudwatch.js";
import { createEc2Configurator } from "./services/ec2.js";
import { createEcsFargateConfigurator } from "./services/ecsFargate.js";
import { createLambdaConfigurator } from "./services/lambda.js";
import { createS3Configurator } from "./services/s3.js";
import { createSqsConfigurator } from "./services/sqs.js";

/**
 * 内置可自动化的服务。Schema 中存在但此处未登记的类型（如 bedrock、kms）
 * 只做校验，编排时记为 unsupported_service_type。
 */
export function createDefaultConfigurators(options: FormConfiguratorOptions = {}): ConfiguratorRegistry {
  const configurators: Configurator[] = [
    createS3Configurator(options),
    createEcsFargateConfigurator(options),
    createAlbConfigurator(options),
    createLambdaConfigurator(options),
    createSqsConfigurator(options),
    createEc2Configurator(options),
    createApiGatewayConfigurator(options),
    createCloudWatchConfigurator(options)
  ];
  const registry = new Map<string, Configurator>();
  for (const configurator of configurators) {
    registry.set(configurator.serviceType, configurator);
  }
  return registry;
}
