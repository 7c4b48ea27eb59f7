import { defineFormConfigurator, type FormConfiguratorOptions } from "../formConfigurator.js";
import { descriptionBinding, regionBinding } from "../commonBindings.js";

export function createLambdaConfigurator(options?: FormConfiguratorOptions) {
  return defineFormConfigurator(
    {
      serviceType: "lambda",
      searchTerms: ["AWS Lambda", "Lambda"],
      fields: {
        description: descriptionBinding,
        region: regionBinding,
        architecture: { control: "select", label: "Architecture", options: { x86: "x86", arm: "Arm" } },
        number_of_requests: { control: "input", label: "Number of requests Value" },
        duration_ms: { control: "input", label: "Duration of each request (in ms) Enter duration in ms" },
        memory_mb: { control: "input", label: "Amount of memory allocated Value" },
        ephemeral_storage_mb: { control: "input", label: "Amount of ephemeral storage allocated Value" }
      }
    },
    options
  );
}
