import { defineFormConfigurator, type FormConfiguratorOptions } from "../formConfigurator.js";
import { descriptionBinding, regionBinding } from "../commonBindings.js";

export function createEc2Configurator(options?: FormConfiguratorOptions) {
  return defineFormConfigurator(
    {
      serviceType: "ec2",
      searchTerms: ["Amazon EC2", "EC2", "Elastic Compute Cloud"],
      fields: {
        description: descriptionBinding,
        region: regionBinding,
        operating_system: {
          control: "select",
          label: "Operating system",
          options: { linux: "Linux", windows: "Windows Server" }
        },
        number_of_instances: { control: "input", label: "Number of instances Enter amount" },
        storage_amount_gb: { control: "input", label: "Storage amount Value" },
        iops_per_volume: { control: "input", label: "General Purpose SSD (gp3) - IOPS Enter amount of IOPS per volume" },
        throughput_mbps: { control: "input", label: "General Purpose SSD (gp3) - Throughput Value" },
        enable_monitoring: { control: "toggle", label: "Enable monitoring" }
      }
    },
    options
  );
}
