import { defineFormConfigurator, type FormConfiguratorOptions } from "../formConfigurator.js";
import { descriptionBinding, regionBinding } from "../commonBindings.js";

export function createSqsConfigurator(options?: FormConfiguratorOptions) {
  return defineFormConfigurator(
    {
      serviceType: "sqs",
      searchTerms: ["Amazon Simple Queue Service (SQS)", "SQS", "Simple Queue Service"],
      fields: {
        description: descriptionBinding,
        region: regionBinding,
        standard_queue_requests: { control: "input", label: "Standard queue requests Value" },
        fifo_queue_requests: { control: "input", label: "FIFO queue requests Value" },
        fair_queue_requests: { control: "input", label: "Fair queue requests Value" }
      }
    },
    options
  );
}
