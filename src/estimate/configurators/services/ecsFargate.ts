import { defineFormConfigurator, type FormConfiguratorOptions } from "../formConfigurator.js";
import { descriptionBinding, regionBinding } from "../commonBindings.js";

export function createEcsFargateConfigurator(options?: FormConfiguratorOptions) {
  return defineFormConfigurator(
    {
      serviceType: "ecs_fargate",
      searchTerms: ["AWS Fargate", "Fargate", "Amazon ECS"],
      fields: {
        description: descriptionBinding,
        region: regionBinding,
        operating_system: { control: "select", label: "Operating system", options: { linux: "Linux", windows: "Windows" } },
        number_of_tasks: { control: "input", label: "Number of tasks or pods Value" },
        average_duration_minutes: { control: "input", label: "Average duration Value" },
        vcpu: { control: "input", label: "Amount of vCPU allocated Value" },
        memory_gb: { control: "input", label: "Amount of memory allocated Value" },
        ephemeral_storage_gb: { control: "input", label: "Amount of ephemeral storage allocated for Amazon ECS Value" }
      }
    },
    options
  );
}
