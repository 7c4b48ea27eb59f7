import type { FastifyPluginAsync } from "fastify";

import type { ConfiguratorRegistry } from "../../../estimate/configurators/base.js";
import type { SchemaRegistry } from "../../../estimate/schema/registry.js";
import type { ServiceSchema } from "../../../estimate/schema/types.js";

interface ServicesPluginOptions {
  basePath: string;
  registry: SchemaRegistry;
  configurators: ConfiguratorRegistry;
}

interface TypeParams {
  type: string;
}

export const servicesPlugin: FastifyPluginAsync<ServicesPluginOptions> = async (app, options) => {
  const { registry, configurators } = options;
  const servicesRoute = `${options.basePath}/services`;

  const summarize = (schema: ServiceSchema) => ({
    serviceType: schema.serviceType,
    displayName: schema.displayName,
    aliases: schema.aliases,
    automated: configurators.has(schema.serviceType)
  });

  // GET /api/v1/services - 服务目录
  app.get(servicesRoute, async () => {
    const services = registry.list().map(summarize);
    return { total: services.length, services };
  });

  // GET /api/v1/services/:type - 单个服务 schema（支持别名）
  app.get<{ Params: TypeParams }>(`${servicesRoute}/:type`, async (request, reply) => {
    const { type } = request.params;
    const schema = registry.getSchema(type) ?? registry.getSchema(registry.resolveAlias(type) ?? "");
    if (!schema) {
      reply.code(404);
      return { error: { code: "service_not_found", message: `未找到服务类型 ${type}` } };
    }
    return { ...summarize(schema), fields: schema.fields };
  });
};
