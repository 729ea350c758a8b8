import { describe, it, expect } from "vitest";
import { assertSafeMembers, isInside } from "../archive.js";

describe("isInside", () => {
  it("accepts the directory itself and its descendants", () => {
    expect(isInside("/ws", "/ws")).toBe(true);
    expect(isInside("/ws", "/ws/src/main.py")).toBe(true);
  });

  it("rejects siblings and parents", () => {
    expect(isInside("/ws", "/ws-other/file")).toBe(false);
    expect(isInside("/ws", "/")).toBe(false);
  });
});

describe("assertSafeMembers", () => {
  it("accepts ordinary members and internal links", () => {
    expect(() =>
      assertSafeMembers(
        [
          { path: "Makefile", type: "File" },
          { path: "src/", type: "Directory" },
          { path: "src/link.py", type: "SymbolicLink", linkpath: "main.py" },
          { path: "docs/hard", type: "Link", linkpath: "README.md" },
        ],
        "/ws",
      ),
    ).not.toThrow();
  });

  it("rejects traversal and absolute members", () => {
    expect(() => assertSafeMembers([{ path: "../evil.txt", type: "File" }], "/ws")).toThrow(
      "Unsafe archive member: ../evil.txt",
    );
    expect(() => assertSafeMembers([{ path: "/etc/passwd", type: "File" }], "/ws")).toThrow(
      "Unsafe archive member: /etc/passwd",
    );
  });

  it("rejects links that point outside", () => {
    expect(() =>
      assertSafeMembers([{ path: "src/escape", type: "SymbolicLink", linkpath: "../../outside" }], "/ws"),
    ).toThrow("Unsafe archive member: src/escape -> ../../outside");
    expect(() => assertSafeMembers([{ path: "hard", type: "Link", linkpath: "../outside" }], "/ws")).toThrow(
      "Unsafe archive member: hard -> ../outside",
    );
  });
});
