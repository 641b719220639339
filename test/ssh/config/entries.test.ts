import { describe, expect, it } from "vitest";
import { classifyKey, classifyLine } from "../../../src/ssh/config/entries.js";
import { UnparseableLineError } from "../../../src/ssh/config/errors.js";

describe("classifyLine", () => {
  it("splits on whitespace", () => {
    expect(classifyLine("HostName example.com")).toEqual({
      key: { kind: "directive", name: "HostName" },
      value: "example.com",
    });
  });

  it("accepts = with or without surrounding whitespace", () => {
    expect(classifyLine("Port=2222").value).toBe("2222");
    expect(classifyLine("Port = 2222").value).toBe("2222");
    expect(classifyLine("Port =2222").value).toBe("2222");
    expect(classifyLine("Port\t2222").value).toBe("2222");
  });

  it("matches keys case-insensitively and reports the canonical name", () => {
    expect(classifyLine("proxyjump bastion").key).toEqual({ kind: "directive", name: "ProxyJump" });
    expect(classifyLine("HOSTNAME=a").key).toEqual({ kind: "directive", name: "HostName" });
  });

  it("keeps the value intact after the first separator", () => {
    expect(classifyLine("ProxyCommand ssh -W %h:%p bastion").value).toBe("ssh -W %h:%p bastion");
    expect(classifyLine("SetEnv FOO=bar").value).toBe("FOO=bar");
  });

  it("returns unknown keys verbatim", () => {
    expect(classifyLine("Frobnicate yes").key).toEqual({ kind: "unknown", raw: "Frobnicate" });
  });

  it("allows an empty value after =", () => {
    expect(classifyLine("User =").value).toBe("");
  });

  it("rejects a line without separator", () => {
    expect(() => classifyLine("Port")).toThrow(UnparseableLineError);
  });

  it("reports where an unparseable line came from", () => {
    expect(() => classifyLine("Port", { file: "/tmp/config", line: 7 })).toThrow(
      "Invalid line at /tmp/config:7: Port"
    );
  });
});

describe("classifyKey", () => {
  it("recognizes Match as a keyword", () => {
    expect(classifyKey("match")).toEqual({ kind: "directive", name: "Match" });
  });

  it("knows the common ssh_config directives", () => {
    for (const name of ["Host", "Include", "HostName", "User", "Port", "ProxyCommand", "ProxyJump", "IdentityFile"]) {
      expect(classifyKey(name.toUpperCase())).toEqual({ kind: "directive", name });
    }
  });
});
