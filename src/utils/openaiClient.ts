import { OpenAI } from "openai";

export interface OpenAIClientSettings {
  readonly apiKey?: string;
  readonly baseUrl?: string;
}

/**
 * 按配置创建 OpenAI 客户端，支持自定义网关（OPENAI_BASE_URL）。
 */
export function createOpenAIClient(settings: OpenAIClientSettings): OpenAI {
  const apiKey = settings.apiKey?.trim();
  if (!apiKey) {
    throw new Error("缺少 OPENAI_API_KEY，请先在环境变量中配置有效的 API Key。");
  }

  const baseURL = settings.baseUrl?.trim();
  return new OpenAI({
    apiKey,
    baseURL: baseURL && baseURL.length > 0 ? baseURL : undefined
  });
}
