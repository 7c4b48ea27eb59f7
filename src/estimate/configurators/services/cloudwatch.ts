import { defineFormConfigurator, type FormConfiguratorOptions } from "../formConfigurator.js";
import { descriptionBinding, regionBinding } from "../commonBindings.js";

export function createCloudWatchConfigurator(options?: FormConfiguratorOptions) {
  return defineFormConfigurator(
    {
      serviceType: "cloudwatch",
      searchTerms: ["Amazon CloudWatch", "CloudWatch"],
      fields: {
        description: descriptionBinding,
        region: regionBinding,
        metrics_count: { control: "input", label: "Number of Metrics (includes detailed and custom metrics) Enter the amount" },
        dashboards_count: { control: "input", label: "Number of Dashboards Enter the amount" },
        standard_resolution_alarms: { control: "input", label: "Number of Standard Resolution Alarm Metrics Enter the amount" },
        high_resolution_alarms: { control: "input", label: "Number of High Resolution Alarm Metrics Enter the amount" },
        logs_ingested_gb: { control: "input", label: "Standard Logs: Data Ingested Value" },
        logs_scanned_gb: { control: "input", label: "Expected Logs Data scanned Value" }
      }
    },
    options
  );
}
