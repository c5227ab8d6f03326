import { createApp } from "./app";
import { getConfig } from "./config/env";
import { createServices } from "./services/container";

const bootstrap = async () => {
  const config = getConfig();
  const services = createServices(config);
  const app = createApp(services);

  const server = app.listen(config.port, () => {
    console.log(`RAG chat server listening on http://localhost:${config.port}`);
    console.log(
      `Index -> ${services.indexSpec.name} (${config.llm.provider}: ${config.llm.embeddingModel}, ${config.llm.generationModel})`
    );
  });

  const shutdown = () => {
    console.log("Shutting down RAG chat server...");
    server.close(() => process.exit(0));
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
};

bootstrap().catch((error) => {
  console.error("Failed to start RAG chat server:", error);
  process.exit(1);
});
