import test from "node:test";
import assert from "node:assert/strict";
import { parseCliArgs } from "./args.js";

test("parseCliArgs reads global options before the watch command", () => {
    const parsed = parseCliArgs(["--root", "docs", "--font-path", "a", "--font-path", "b", "--host", "0.0.0.0:9000", "watch", "main.txt"]);

    assert.deepEqual(parsed, {
        globals: { root: "docs", fontPaths: ["a", "b"], host: "0.0.0.0:9000" },
        command: { kind: "watch", input: "main.txt" },
    });
});

test("parseCliArgs parses fonts with and without variants", () => {
    assert.deepEqual(parseCliArgs(["fonts"]).command, { kind: "fonts", variants: false });
    assert.deepEqual(parseCliArgs(["fonts", "--variants"]).command, { kind: "fonts", variants: true });
});

test("parseCliArgs falls back to help and version", () => {
    assert.equal(parseCliArgs([]).command.kind, "help");
    assert.equal(parseCliArgs(["watch", "--help"]).command.kind, "help");
    assert.equal(parseCliArgs(["version"]).command.kind, "version");
    assert.equal(parseCliArgs(["--version"]).command.kind, "version");
});

test("parseCliArgs rejects malformed input with usage errors", () => {
    assert.throws(() => parseCliArgs(["watch"]), { name: "CliError", message: "Missing input file. Use: watch <input>" });
    assert.throws(() => parseCliArgs(["--root"]), { message: "Missing value for --root." });
    assert.throws(() => parseCliArgs(["--verbose", "watch", "a.txt"]), { message: "Unknown option '--verbose'." });
    assert.throws(() => parseCliArgs(["watch", "a.txt", "b.txt"]), { message: "Unknown arguments for watch: b.txt" });
    assert.throws(() => parseCliArgs(["fonts", "--all"]), { message: "Unknown arguments for fonts: --all" });
    assert.throws(() => parseCliArgs(["compile", "a.txt"]), { message: "Unsupported command 'compile'." });
});

test("global options after the command are not global", () => {
    assert.throws(() => parseCliArgs(["watch", "a.txt", "--root", "docs"]), /Unknown arguments for watch/);
});
