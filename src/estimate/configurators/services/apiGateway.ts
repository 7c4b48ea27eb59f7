import { defineFormConfigurator, type FormConfiguratorOptions } from "../formConfigurator.js";
import { descriptionBinding, regionBinding } from "../commonBindings.js";

export function createApiGatewayConfigurator(options?: FormConfiguratorOptions) {
  return defineFormConfigurator(
    {
      serviceType: "api_gateway",
      searchTerms: ["Amazon API Gateway", "API Gateway"],
      fields: {
        description: descriptionBinding,
        region: regionBinding,
        // 三类 API 的请求数输入框 aria-label 相同，以 placeholder 区分
        http_api_requests: { control: "input", label: "Requests Value", placeholder: "HTTP API requests" },
        http_api_request_size_kb: { control: "input", label: "Average size of each request Value" },
        rest_api_requests: { control: "input", label: "Requests Value", placeholder: "REST API requests" },
        websocket_messages: { control: "input", label: "Messages Value", placeholder: "WebSocket messages" },
        websocket_message_size_kb: { control: "input", label: "Average message size Value" },
        websocket_connection_rate: { control: "input", label: "Average connection rate Value" },
        websocket_connection_duration_seconds: { control: "input", label: "Average connection duration Value" }
      }
    },
    options
  );
}
