import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { TOOL_NAMES, turntableAbout, type TurntableAboutContext } from "./about.js";
import type { TurntableToolContext } from "./context.js";
import {
  turntableDevicesCommands,
  turntableDevicesCount,
  turntableDevicesGet,
  turntableDevicesProperties,
} from "./devices.js";
import { turntablePropertiesGet, turntablePropertiesSet, turntablePropertiesSetMany } from "./properties.js";
import {
  withJsonStringFallback,
  zCommandId,
  zDeviceIndex,
  zOutAcknowledged,
  zOutDevicesCommands,
  zOutDevicesCount,
  zOutDevicesGet,
  zOutDevicesProperties,
  zOutMcpAbout,
  zOutPropertiesGet,
  zPropertyId,
  zPropertyIds,
  zPropertyValue,
  zRotationDegrees,
  zRotationDirection,
  zRotationSpeed,
  zRotationStep,
} from "./schemas.js";
import { turntableCommandsSend, turntableRotate, turntableRotateDegrees } from "./turntable.js";

/**
 * Register the MCP tool surface: one tool per command-layer operation plus
 * an about tool.
 */
export function registerTools(server: McpServer, ctx: TurntableToolContext, about: TurntableAboutContext): void {
  registerAboutTool(server, about);
  registerDeviceTools(server, ctx);
  registerPropertyTools(server, ctx);
  registerMotionTools(server, ctx);
}

function registerAboutTool(server: McpServer, about: TurntableAboutContext): void {
  server.registerTool(
    TOOL_NAMES.about,
    {
      title: "About turntable-mcp (operational contract)",
      description:
        "Returns the configuration in effect, the tool inventory, rotation bounds, well-known command/property ids and the failure codes the other tools return.",
      inputSchema: {},
      outputSchema: zOutMcpAbout,
    },
    async () => turntableAbout(about)
  );
}

function registerDeviceTools(server: McpServer, ctx: TurntableToolContext): void {
  server.registerTool(
    TOOL_NAMES.devices_count,
    {
      title: "Count attached turntables",
      description:
        "Returns how many Ortery devices OTADCommand.exe sees on the host. Valid device_index values are 0..count-1.",
      inputSchema: {},
      outputSchema: zOutDevicesCount,
    },
    async () => turntableDevicesCount(ctx)
  );

  server.registerTool(
    TOOL_NAMES.devices_get,
    {
      title: "Get device info",
      description:
        "Returns the product name and vendor device id for a device index. Fails with NOT_FOUND when the index is invalid or the device is offline.",
      inputSchema: { device_index: zDeviceIndex },
      outputSchema: zOutDevicesGet,
    },
    async (args) => turntableDevicesGet(ctx, args)
  );

  server.registerTool(
    TOOL_NAMES.devices_commands,
    {
      title: "List supported commands",
      description:
        "Returns the commands the device accepts, in vendor order. Ids missing from the built-in table are returned with known=false.",
      inputSchema: { device_index: zDeviceIndex },
      outputSchema: zOutDevicesCommands,
    },
    async (args) => turntableDevicesCommands(ctx, args)
  );

  server.registerTool(
    TOOL_NAMES.devices_properties,
    {
      title: "List supported properties",
      description:
        "Returns the properties the device exposes, in vendor order. Ids missing from the built-in table are returned with known=false.",
      inputSchema: { device_index: zDeviceIndex },
      outputSchema: zOutDevicesProperties,
    },
    async (args) => turntableDevicesProperties(ctx, args)
  );
}

function registerPropertyTools(server: McpServer, ctx: TurntableToolContext): void {
  server.registerTool(
    TOOL_NAMES.properties_get,
    {
      title: "Read a property",
      description:
        "Reads an integer property (e.g., 16641 turntable state, 16643 total steps). Empty vendor replies are polled; persistent silence returns TIMEOUT.",
      inputSchema: { device_index: zDeviceIndex, property_id: zPropertyId },
      outputSchema: zOutPropertiesGet,
    },
    async (args) => turntablePropertiesGet(ctx, args)
  );

  server.registerTool(
    TOOL_NAMES.properties_set,
    {
      title: "Write a property",
      description: "Sets an integer property on the device.",
      inputSchema: { device_index: zDeviceIndex, property_id: zPropertyId, value: zPropertyValue },
      outputSchema: zOutAcknowledged,
    },
    async (args) => turntablePropertiesSet(ctx, args)
  );

  server.registerTool(
    TOOL_NAMES.properties_set_many,
    {
      title: "Write several properties",
      description: "Sets 1 to 20 properties to the same integer value in one vendor call.",
      inputSchema: {
        device_index: zDeviceIndex,
        property_ids: withJsonStringFallback(zPropertyIds, "property_ids"),
        value: zPropertyValue,
      },
      outputSchema: zOutAcknowledged,
    },
    async (args) => turntablePropertiesSetMany(ctx, args)
  );
}

function registerMotionTools(server: McpServer, ctx: TurntableToolContext): void {
  server.registerTool(
    TOOL_NAMES.commands_send,
    {
      title: "Send a command",
      description:
        "Sends a numeric command: 12801/12802/12803 shutter release off/halfway/completely, 13057 stop, 13058 release motor.",
      inputSchema: { device_index: zDeviceIndex, command_id: zCommandId },
      outputSchema: zOutAcknowledged,
    },
    async (args) => turntableCommandsSend(ctx, args)
  );

  server.registerTool(
    TOOL_NAMES.rotate,
    {
      title: "Rotate by steps",
      description: "Turns the turntable by a number of motor steps at the given speed and direction.",
      inputSchema: {
        device_index: zDeviceIndex,
        speed: zRotationSpeed,
        direction: zRotationDirection,
        step: zRotationStep,
      },
      outputSchema: zOutAcknowledged,
    },
    async (args) => turntableRotate(ctx, args)
  );

  server.registerTool(
    TOOL_NAMES.rotate_degrees,
    {
      title: "Rotate by degrees",
      description:
        "Turns the turntable by an angle. Reads property 16643 (total steps per revolution) first and converts the angle to steps.",
      inputSchema: {
        device_index: zDeviceIndex,
        speed: zRotationSpeed,
        direction: zRotationDirection,
        degrees: zRotationDegrees,
      },
      outputSchema: zOutAcknowledged,
    },
    async (args) => turntableRotateDegrees(ctx, args)
  );
}
