import { Hono } from "hono";
import { ROTATOR_CONFIG } from "../config/rotator-config";

const swaggerRoutes = new Hono();

const { basePath, categoryParam } = ROTATOR_CONFIG.server;

const openApiSpec = {
  openapi: "3.0.3",
  info: {
    title: "Banner Rotator API",
    version: "1.0.0",
    description:
      "In-memory banner inventory. Each request draws one banner among those matching the requested categories, with probability proportional to its impression budget, and consumes one impression.",
  },
  servers: [
    {
      url: "/",
      description: "Current server",
    },
  ],
  tags: [{ name: "Health" }, { name: "Banners" }],
  components: {
    schemas: {
      HealthResponse: {
        type: "object",
        properties: {
          status: { type: "string", example: "ok" },
          banners: { type: "integer", example: 120, description: "Banners loaded at startup" },
          timestamp: { type: "string", format: "date-time" },
        },
      },
      MessageResponse: {
        type: "object",
        properties: {
          message: { type: "string", example: "No banner available" },
        },
      },
      ErrorResponse: {
        type: "object",
        properties: {
          error: { type: "string" },
        },
      },
    },
  },
  paths: {
    [`${basePath}/health`]: {
      get: {
        tags: ["Health"],
        summary: "Health check",
        responses: {
          "200": {
            description: "Service health",
            content: {
              "application/json": {
                schema: { $ref: "#/components/schemas/HealthResponse" },
              },
            },
          },
        },
      },
    },
    [`${basePath}/banners/serve`]: {
      get: {
        tags: ["Banners"],
        summary: "Serve one banner impression",
        description:
          "Picks a banner tagged with at least one of the requested categories that still has impressions left. Without categories any banner may be picked.",
        parameters: [
          {
            name: categoryParam,
            in: "query",
            required: false,
            style: "form",
            explode: true,
            schema: { type: "array", items: { type: "string" } },
            example: ["sports", "news"],
          },
        ],
        responses: {
          "200": {
            description: "Banner markup; the banner URL is embedded verbatim",
            content: {
              "text/html": {
                schema: { type: "string" },
                example: '<html><body><img src="http://banners.example/1.jpg"/></body></html>',
              },
            },
          },
          "404": {
            description: "No eligible banner, or the winner ran out of impressions",
            content: {
              "application/json": {
                schema: { $ref: "#/components/schemas/MessageResponse" },
              },
            },
          },
          "500": {
            description: "Server error",
            content: {
              "application/json": {
                schema: { $ref: "#/components/schemas/ErrorResponse" },
              },
            },
          },
        },
      },
    },
  },
};

swaggerRoutes.get("/openapi.json", (c) => c.json(openApiSpec));

swaggerRoutes.get("/docs", (c) => {
  const html = `<!doctype html>
<html lang="en">
  <head>
    <meta charset="UTF-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1.0" />
    <title>Banner Rotator API Docs</title>
    <link
      rel="stylesheet"
      href="https://unpkg.com/swagger-ui-dist@5/swagger-ui.css"
    />
  </head>
  <body>
    <div id="swagger-ui"></div>
    <script src="https://unpkg.com/swagger-ui-dist@5/swagger-ui-bundle.js"></script>
    <script>
      window.ui = SwaggerUIBundle({
        url: "${basePath}/openapi.json",
        dom_id: "#swagger-ui",
      });
    </script>
  </body>
</html>`;

  return c.html(html);
});

export default swaggerRoutes;
