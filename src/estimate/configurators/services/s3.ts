import { defineFormConfigurator, type FormConfiguratorOptions } from "../formConfigurator.js";
import { descriptionBinding, regionBinding } from "../commonBindings.js";
import type { FieldValue } from "../../schema/types.js";

const STORAGE_CLASS_LABELS: Readonly<Record<string, string>> = {
  standard: "S3 Standard",
  intelligent_tiering: "S3 Intelligent - Tiering",
  standard_ia: "S3 Standard - Infrequent Access",
  one_zone_ia: "S3 One Zone - Infrequent Access",
  glacier_instant_retrieval: "S3 Glacier Instant Retrieval",
  glacier_flexible_retrieval: "S3 Glacier Flexible Retrieval",
  glacier_deep_archive: "S3 Glacier Deep Archive"
};

// 存储量与请求数输入框的 aria-label 随存储类别变化
function storageClassLabel(values: Readonly<Record<string, FieldValue>>): string {
  const storageClass = values.storage_class;
  return (typeof storageClass === "string" ? STORAGE_CLASS_LABELS[storageClass] : undefined) ?? "S3 Standard";
}

export function createS3Configurator(options?: FormConfiguratorOptions) {
  return defineFormConfigurator(
    {
      serviceType: "s3",
      searchTerms: ["Amazon Simple Storage Service (S3)", "S3", "Simple Storage Service"],
      fields: {
        description: descriptionBinding,
        region: regionBinding,
        storage_class: { control: "select", label: "S3 storage classes", options: STORAGE_CLASS_LABELS },
        storage_gb: { control: "input", label: (values) => `${storageClassLabel(values)} storage Value` },
        put_requests: {
          control: "input",
          label: (values) => `PUT, COPY, POST, LIST requests to ${storageClassLabel(values)} Enter amount of requests`
        },
        get_requests: {
          control: "input",
          label: (values) =>
            `GET, SELECT, and all other requests from ${storageClassLabel(values)} Enter amount of requests`
        }
      }
    },
    options
  );
}
