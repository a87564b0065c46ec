import { detectCategory, scanToolCall } from "../src/detect_attacks";
import { createToolCall } from "../src/tool_call";
import { buildPolicy } from "./helpers";

function policyWith(onDetect: "deny" | "flag", fields = ["query", "url", "path"]) {
  return buildPolicy({ detect_attacks: { enabled: true, on_detect: onDetect, fields } });
}

function scan(args: Record<string, unknown>, onDetect: "deny" | "flag" = "deny") {
  return scanToolCall(createToolCall({ tool_name: "search", arguments: args }), policyWith(onDetect));
}

describe("scanToolCall", () => {
  it("should deny a SQL tautology in a scanned field", () => {
    const result = scan({ query: "' OR '1'='1" });
    expect(result.decision).toEqual({
      allowed: false,
      reason: 'potential sql_injection detected in argument "query"',
      policy_id: "test-policy",
      remediation: "Remove suspicious patterns from arguments.",
      layer: "detect_attacks",
    });
    expect(result.detections).toEqual([{ field: "query", category: "sql_injection" }]);
  });

  it.each([
    ["query", "1 UNION SELECT password FROM users", "sql_injection"],
    ["path", "../../etc/passwd", "path_traversal"],
    ["url", "http://169.254.169.254/latest/meta-data/", "ssrf"],
    ["url", "http://localhost:8080/admin", "ssrf"],
  ])("should classify %s=%p as %s", (field, value, category) => {
    expect(scan({ [field]: value }).detections).toEqual([{ field, category }]);
  });

  it("should pass benign values", () => {
    const result = scan({
      query: "O'Brien printer paper",
      url: "https://example.com/docs",
      path: "reports/2024/q1.csv",
    });
    expect(result.decision).toEqual({
      allowed: true,
      reason: "no attack patterns found",
      policy_id: "test-policy",
      layer: "detect_attacks",
    });
    expect(result.detections).toEqual([]);
  });

  it("should ignore arguments outside the configured fields", () => {
    expect(scan({ note: "' OR '1'='1" }).decision.allowed).toBe(true);
  });

  it("should look inside nested values", () => {
    const result = scan({ path: { segments: ["docs", "../secrets"] } });
    expect(result.detections).toEqual([{ field: "path", category: "path_traversal" }]);
  });

  it("should allow and report every detection in field order when flagging", () => {
    const result = scan({ url: "http://localhost/", query: "1 UNION SELECT x" }, "flag");
    expect(result.decision.allowed).toBe(true);
    expect(result.decision.reason).toBe("suspicious arguments flagged");
    expect(result.detections).toEqual([
      { field: "query", category: "sql_injection" },
      { field: "url", category: "ssrf" },
    ]);
  });

  it("should skip scanning when disabled", () => {
    const call = createToolCall({ tool_name: "search", arguments: { query: "' OR '1'='1" } });
    const result = scanToolCall(call, buildPolicy());
    expect(result.decision.reason).toBe("attack detection disabled");
    expect(result.detections).toEqual([]);
  });
});

describe("detectCategory", () => {
  it("should return the first matching category", () => {
    expect(detectCategory(["fine", "%2e%2e/boot.ini"])).toBe("path_traversal");
    expect(detectCategory(["http://[::1]:8080/"])).toBe("ssrf");
    expect(detectCategory(["http://[fe80::1%25eth0]/"])).toBe("ssrf");
    expect(detectCategory(["http://[::ffff:7f00:1]:8080/"])).toBe("ssrf");
    expect(detectCategory(["http://[2001:db8::1]/"])).toBeUndefined();
    expect(detectCategory(["plain text"])).toBeUndefined();
  });
});
