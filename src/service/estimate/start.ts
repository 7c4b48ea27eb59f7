import process from "node:process";

import { loadSettings } from "../../shared/config/settings.js";
import { createEstimateService } from "./server.js";

async function main() {
  const settings = loadSettings();
  const { host, port, basePath } = settings.service;
  const { app } = await createEstimateService({ settings });

  let closing = false;
  const close = async (signal: string) => {
    if (closing) {
      return;
    }
    closing = true;
    console.log(`\n收到 ${signal} 信号，正在关闭服务...`);
    await app.close();
    console.log("✓ 服务已关闭");
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      close(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          console.error("关闭服务失败", error);
          process.exit(1);
        }
      );
    });
  }

  const address = await app.listen({ port, host });
  console.log(`\n✅ Estimate Service 已启动：${address}${basePath}`);
  console.log(`   计价器地址：${settings.calculatorUrl}`);
  if (!settings.openai.apiKey) {
    console.log("   未配置 OPENAI_API_KEY，仅接受预归一化文档。");
  }
  console.log("\n按 Ctrl+C 停止服务\n");
}

main().catch((error: unknown) => {
  console.error("Estimate Service 启动失败", error);
  process.exit(1);
});
