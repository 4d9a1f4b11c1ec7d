import { describe, expect, it } from "vitest";

import { createFakeAdb, fail, ok } from "../../__tests__/helpers.js";
import { AdbDevice, parseDevicesOutput } from "../adb.js";

describe("parseDevicesOutput", () => {
  it("reads serials and states", () => {
    const output = [
      "* daemon started successfully",
      "List of devices attached",
      "R58M123ABC\tdevice",
      "emulator-5554\toffline",
      "0123456789\tunauthorized",
      "weird-one\tsideload",
      "",
    ].join("\n");

    expect(parseDevicesOutput(output)).toEqual([
      { serial: "R58M123ABC", state: "device" },
      { serial: "emulator-5554", state: "offline" },
      { serial: "0123456789", state: "unauthorized" },
      { serial: "weird-one", state: "unknown" },
    ]);
  });

  it("returns nothing for an empty list", () => {
    expect(parseDevicesOutput("List of devices attached\r\n\r\n")).toEqual([]);
  });
});

describe("AdbDevice", () => {
  it("classifies directory probes", async () => {
    const adb = createFakeAdb({
      shell: (command) => {
        if (command.includes("/readable")) return ok("Saves/\n");
        if (command.includes("/blocked")) return fail("ls: /blocked: Permission denied");
        return fail("ls: No such file or directory");
      },
    });
    const device = new AdbDevice(adb, "SERIAL1");

    expect(await device.probeDirectory("/readable")).toBe("ok");
    expect(await device.probeDirectory("/blocked")).toBe("denied");
    expect(await device.probeDirectory("/absent")).toBe("missing");
    expect(adb.commands[0]).toBe("ls -1 '/readable'");
  });

  it("trims property values and maps failures to empty", async () => {
    const adb = createFakeAdb({
      shell: (command) => (command === "getprop ro.product.model" ? ok("Pixel 7\n") : fail("")),
    });
    const device = new AdbDevice(adb, "SERIAL1");

    expect(await device.getProp("ro.product.model")).toBe("Pixel 7");
    expect(await device.getProp("ro.product.manufacturer")).toBe("");
  });
});
