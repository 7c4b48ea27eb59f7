import { defineFormConfigurator, type FormConfiguratorOptions } from "../formConfigurator.js";
import { descriptionBinding, regionBinding } from "../commonBindings.js";

export function createAlbConfigurator(options?: FormConfiguratorOptions) {
  return defineFormConfigurator(
    {
      serviceType: "alb",
      searchTerms: ["Elastic Load Balancing", "Application Load Balancer", "Load Balancer"],
      fields: {
        description: descriptionBinding,
        region: regionBinding,
        alb_count: { control: "input", label: "Number of Application Load Balancers" },
        processed_bytes_gb: { control: "input", label: "Processed bytes (EC2 Instances and IP addresses as targets) Value" },
        new_connections_per_second: { control: "input", label: "Average number of new connections per ALB Value" },
        connection_duration_seconds: { control: "input", label: "Average connection duration Value" },
        requests_per_second: { control: "input", label: "Average number of requests per second per ALB Enter amount" },
        rule_evaluations_per_request: { control: "input", label: "Average number of rule evaluations per request Enter amount" }
      }
    },
    options
  );
}
