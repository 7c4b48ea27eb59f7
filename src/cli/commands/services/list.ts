import { resolve as resolvePath } from "node:path";

import { Command, Flags } from "@oclif/core";

import { createConfiguratorsFromSettings } from "../../../estimate/factory.js";
import { loadSchemaRegistry } from "../../../estimate/schema/registry.js";
import { loadSettings } from "../../../shared/config/settings.js";
import { toErrorMessage } from "../../../shared/errors/estimateErrors.js";
import { EXIT_CODES } from "../../runtime/estimateRun.js";

interface ServiceListing {
  readonly serviceType: string;
  readonly displayName: string;
  readonly aliases: readonly string[];
  readonly automated: boolean;
  readonly fields: number;
}

export default class ServicesList extends Command {
  static override summary = "列出支持的服务类型";

  static override flags = {
    schemas: Flags.string({ description: "服务 schema 文件路径" }),
    json: Flags.boolean({ description: "以 JSON 输出", default: false })
  } as const;

  override async run(): Promise<void> {
    const { flags } = await this.parse(ServicesList);
    const services = await this.loadListings(flags.schemas);

    if (flags.json) {
      this.log(JSON.stringify({ services }, null, 2));
      return;
    }
    for (const service of services) {
      const mode = service.automated ? "自动化" : "仅校验";
      this.log(`${service.serviceType.padEnd(14)} ${service.displayName} [${mode}]`);
      if (service.aliases.length > 0) {
        this.log(`${"".padEnd(14)} 别名：${service.aliases.join(", ")}`);
      }
    }
  }

  private async loadListings(schemasPath?: string): Promise<ServiceListing[]> {
    try {
      const settings = loadSettings();
      const registry = await loadSchemaRegistry({
        filePath: schemasPath ? resolvePath(schemasPath) : settings.schemasPath
      });
      const configurators = createConfiguratorsFromSettings(settings);
      return registry.list().map((schema) => ({
        serviceType: schema.serviceType,
        displayName: schema.displayName,
        aliases: schema.aliases,
        automated: configurators.has(schema.serviceType),
        fields: schema.fields.length
      }));
    } catch (error) {
      this.error(toErrorMessage(error), { exit: EXIT_CODES.usage });
    }
  }
}
