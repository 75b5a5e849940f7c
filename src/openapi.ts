const zoneParam = { in: "path", name: "zone", required: true, schema: { type: "string" }, example: "Z1" };
const measurementParam = { in: "query", name: "measurement", required: true, schema: { type: "string" }, example: "temp" };
const variableParam = { in: "query", name: "variable", required: true, schema: { type: "string" }, example: "Air_temperature" };

const errors = {
  "401": { description: "Unauthorized" },
  "404": { description: "Zone, measurement or variable not found" },
  "422": { description: "Validation error" },
  "500": { description: "Store error" },
};

export const openapi = {
  openapi: "3.0.3",
  info: { title: "Zone Monitor — Reporting API", version: "1.0.0" },
  components: {
    securitySchemes: {
      BearerAuth: { type: "http", scheme: "bearer" }
    },
    schemas: {
      Zone: {
        type: "object",
        properties: {
          ZoneID: { type: "integer" },
          ZoneName: { type: "string" },
          ZoneDescription: { type: "string", nullable: true }
        }
      },
      Measurement: {
        type: "object",
        properties: {
          MeasurementID: { type: "integer" },
          MeasurementName: { type: "string" },
          Unit: { type: "string", nullable: true }
        }
      },
      SeriesPoint: {
        type: "object",
        properties: {
          ReadingHour: { type: "string", example: "2024-01-01 00" },
          Value: { type: "number", nullable: true }
        }
      },
      Aggregates: {
        type: "object",
        properties: {
          mean: { type: "number", nullable: true },
          max: { type: "number", nullable: true },
          count: { type: "integer" }
        }
      },
      DailyTrendPoint: {
        type: "object",
        properties: {
          day: { type: "string", example: "2024-01-01" },
          zone: { type: "number", nullable: true },
          outdoor: { type: "number", nullable: true }
        }
      }
    }
  },
  security: [{ BearerAuth: [] }],
  tags: [
    { name: "Reference" },
    { name: "Outdoor" },
    { name: "Zones" }
  ],
  paths: {
    "/v1/healthz": {
      get: {
        tags: ["Reference"],
        summary: "Service health",
        security: [],
        responses: { "200": { description: "OK" } }
      }
    },
    "/v1/zones": {
      get: {
        tags: ["Reference"],
        summary: "List zones",
        responses: {
          "200": { description: "OK", content: { "application/json": { schema: {
            type: "object", properties: { items: { type: "array", items: { $ref: "#/components/schemas/Zone" } } }
          } } } },
          ...errors
        }
      }
    },
    "/v1/measurements": {
      get: {
        tags: ["Reference"],
        summary: "List measurements with units",
        responses: {
          "200": { description: "OK", content: { "application/json": { schema: {
            type: "object", properties: { items: { type: "array", items: { $ref: "#/components/schemas/Measurement" } } }
          } } } },
          ...errors
        }
      }
    },
    "/v1/outdoor/series": {
      get: {
        tags: ["Outdoor"],
        summary: "Hourly series of an outdoor variable",
        parameters: [variableParam],
        responses: {
          "200": { description: "OK", content: { "application/json": { schema: {
            type: "object", properties: { items: { type: "array", items: { $ref: "#/components/schemas/SeriesPoint" } } }
          } } } },
          ...errors
        }
      }
    },
    "/v1/outdoor/aggregates": {
      get: {
        tags: ["Outdoor"],
        summary: "Mean and max of an outdoor variable",
        parameters: [variableParam],
        responses: {
          "200": { description: "OK", content: { "application/json": { schema: { $ref: "#/components/schemas/Aggregates" } } } },
          ...errors
        }
      }
    },
    "/v1/zones/{zone}/series": {
      get: {
        tags: ["Zones"],
        summary: "Hourly series of a zone measurement",
        parameters: [zoneParam, measurementParam],
        responses: {
          "200": { description: "OK", content: { "application/json": { schema: {
            type: "object", properties: { items: { type: "array", items: { $ref: "#/components/schemas/SeriesPoint" } } }
          } } } },
          ...errors
        }
      }
    },
    "/v1/zones/{zone}/aggregates": {
      get: {
        tags: ["Zones"],
        summary: "Mean and max of a zone measurement",
        parameters: [zoneParam, measurementParam],
        responses: {
          "200": { description: "OK", content: { "application/json": { schema: { $ref: "#/components/schemas/Aggregates" } } } },
          ...errors
        }
      }
    },
    "/v1/zones/{zone}/kpis": {
      get: {
        tags: ["Zones"],
        summary: "Average outdoor temperature, average zone temperature, max zone CO2",
        parameters: [zoneParam],
        responses: { "200": { description: "OK" }, ...errors }
      }
    },
    "/v1/zones/{zone}/daily": {
      get: {
        tags: ["Zones"],
        summary: "Daily means of a zone measurement against an outdoor variable",
        parameters: [
          zoneParam,
          { ...measurementParam, required: false, schema: { type: "string", default: "temp" } },
          { ...variableParam, required: false, schema: { type: "string", default: "Air_temperature" } }
        ],
        responses: {
          "200": { description: "OK", content: { "application/json": { schema: {
            type: "object", properties: { items: { type: "array", items: { $ref: "#/components/schemas/DailyTrendPoint" } } }
          } } } },
          ...errors
        }
      }
    }
  }
};
