import os from "os";
import path from "path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { EXAMPLES_TEXT, HELP_TEXT, runCli } from "../../../bin/cli";
import { EXIT_CODES } from "../../../bin/common/constants/app.constants";

const CONFIG = { defaultShift: 3, logDir: null, logToConsole: false };

async function run(...argv: string[]) {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const code = await runCli(
    argv,
    {
      stdout: (line) => stdout.push(line),
      stderr: (line) => stderr.push(line),
    },
    CONFIG
  );
  return { code, stdout, stderr };
}

describe("runCli", () => {
  describe("caesar", () => {
    it("encrypts literal text", async () => {
      const result = await run("encrypt", "--algo", "caesar", "--in", "Hello, World!", "--shift", "3");

      expect(result).toEqual({
        code: EXIT_CODES.OK,
        stdout: ["Khoor, Zruog!"],
        stderr: ["Encrypted successfully (caesar). Printed to stdout"],
      });
    });

    it("decrypts with the default shift", async () => {
      const result = await run("decrypt", "--algo", "caesar", "--in", "Khoor");

      expect(result.code).toBe(EXIT_CODES.OK);
      expect(result.stdout).toEqual(["Hello"]);
      expect(result.stderr).toEqual(["Decrypted successfully (caesar). Printed to stdout"]);
    });

    it("accepts negative shifts in both spellings", async () => {
      const spaced = await run("encrypt", "--algo", "caesar", "--in", "Hello, World!", "--shift", "-3");
      const inline = await run("encrypt", "--algo", "caesar", "--in", "Hello, World!", "--shift=-3");

      expect(spaced.stdout).toEqual(["Ebiil, Tloia!"]);
      expect(inline.stdout).toEqual(["Ebiil, Tloia!"]);
    });

    it("accepts shifts beyond the safe integer range", async () => {
      const positive = await run("encrypt", "--algo", "caesar", "--in", "abc", "--shift", "100000000000000000000");
      const negative = await run("encrypt", "--algo", "caesar", "--in", "abc", "--shift", "-100000000000000000000");

      expect(positive).toEqual({
        code: EXIT_CODES.OK,
        stdout: ["wxy"],
        stderr: ["Encrypted successfully (caesar). Printed to stdout"],
      });
      expect(negative.code).toBe(EXIT_CODES.OK);
      expect(negative.stdout).toEqual(["efg"]);
    });

    it("accepts input that starts with a dash", async () => {
      const result = await run("encrypt", "--algo", "caesar", "--in", "-abc-");

      expect(result.stdout).toEqual(["-def-"]);
    });

    it("rejects a non-integer shift", async () => {
      const result = await run("encrypt", "--algo", "caesar", "--in", "abc", "--shift", "x");

      expect(result.code).toBe(EXIT_CODES.USAGE);
      expect(result.stdout).toEqual([]);
      expect(result.stderr[0]).toBe("Error: Invalid value for '--shift': 'x' is not an integer");
    });
  });

  describe("base64", () => {
    it("encodes and decodes literal text", async () => {
      const encoded = await run("encrypt", "--algo", "base64", "--in", "Hello");
      const decoded = await run("decrypt", "--algo", "base64", "--in", "SGVsbG8=");

      expect(encoded.stdout).toEqual(["SGVsbG8="]);
      expect(decoded.stdout).toEqual(["Hello"]);
      expect(decoded.stderr).toEqual(["Decrypted successfully (base64). Printed to stdout"]);
    });

    it("exits with the invalid-encoding code on malformed input", async () => {
      const result = await run("decrypt", "--algo", "base64", "--in", "not-valid@@@");

      expect(result).toEqual({
        code: EXIT_CODES.INVALID_ENCODING,
        stdout: [],
        stderr: ['Error: Invalid Base64 input (illegal character "-" at position 3)'],
      });
    });
  });

  describe("files", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), "cipherbox-cli-"));
    });

    afterEach(async () => {
      await fs.remove(dir);
    });

    it("reads input from a file and writes the result to --out", async () => {
      const source = path.join(dir, "plain.txt");
      const target = path.join(dir, "out", "cipher.txt");
      await fs.writeFile(source, "Hello\n", "utf-8");

      const result = await run("encrypt", "--algo", "caesar", "--in", source, "--out", target);

      expect(result).toEqual({
        code: EXIT_CODES.OK,
        stdout: [],
        stderr: [`Encrypted successfully (caesar). Saved to ${target}`],
      });
      expect(await fs.readFile(target, "utf-8")).toBe("Khoor\n");
    });

    it("trims whitespace around base64 read from a file", async () => {
      const source = path.join(dir, "encoded.txt");
      await fs.writeFile(source, "SGVsbG8=\n", "utf-8");

      const result = await run("decrypt", "--algo", "base64", "--in", source);

      expect(result.code).toBe(EXIT_CODES.OK);
      expect(result.stdout).toEqual(["Hello"]);
    });

    it("rejects files that are not valid UTF-8", async () => {
      const source = path.join(dir, "binary.bin");
      await fs.writeFile(source, Buffer.from([0xff, 0xfe, 0x41]));

      const result = await run("encrypt", "--algo", "base64", "--in", source);

      expect(result).toEqual({
        code: EXIT_CODES.FAILURE,
        stdout: [],
        stderr: [`Error: File '${source}' is not valid UTF-8 text`],
      });
    });

    it("reports write failures with the generic failure code", async () => {
      const blocker = path.join(dir, "blocker");
      await fs.writeFile(blocker, "", "utf-8");

      const result = await run("encrypt", "--algo", "base64", "--in", "Hello", "--out", path.join(blocker, "x.txt"));

      expect(result.code).toBe(EXIT_CODES.FAILURE);
      expect(result.stdout).toEqual([]);
      expect(result.stderr).toHaveLength(1);
      expect(result.stderr[0]).toMatch(/^Error: /);
    });
  });

  describe("usage", () => {
    it("prints help without a command", async () => {
      expect(await run()).toEqual({ code: EXIT_CODES.OK, stdout: [HELP_TEXT], stderr: [] });
      expect(await run("encrypt", "--help")).toEqual({ code: EXIT_CODES.OK, stdout: [HELP_TEXT], stderr: [] });
    });

    it("prints the version", async () => {
      expect((await run("--version")).stdout).toEqual(["cipherbox 1.0.0"]);
    });

    it("prints examples", async () => {
      expect((await run("examples")).stdout).toEqual([EXAMPLES_TEXT]);
    });

    it("lists algorithms", async () => {
      const result = await run("algorithms");

      expect(result.code).toBe(EXIT_CODES.OK);
      expect(result.stdout).toHaveLength(2);
      expect(result.stdout[0].startsWith("caesar   Caesar shift [--shift]: ")).toBe(true);
      expect(result.stdout[1].startsWith("base64   Base64: ")).toBe(true);
    });

    it.each([
      [["encrypt", "--in", "abc"], "Error: Missing required option '--algo'"],
      [["encrypt", "--algo", "caesar"], "Error: Missing required option '--in'"],
      [["encrypt", "--algo", "aes", "--in", "abc"], "Error: Invalid value for '--algo': 'aes' (choose from caesar, base64)"],
      [["frobnicate"], "Error: Unknown command 'frobnicate'"],
      [["encrypt", "extra", "--algo", "caesar", "--in", "abc"], "Error: Unexpected argument 'extra'"],
    ])("rejects %j", async (argv, message) => {
      const result = await run(...argv);

      expect(result.code).toBe(EXIT_CODES.USAGE);
      expect(result.stdout).toEqual([]);
      expect(result.stderr).toEqual([message, "Run 'cipherbox --help' for usage."]);
    });

    it("rejects unknown options", async () => {
      const result = await run("encrypt", "--bogus");

      expect(result.code).toBe(EXIT_CODES.USAGE);
      expect(result.stderr[0]).toMatch(/^Error: Unknown option '--bogus'/);
    });

    it("rejects an option without its value", async () => {
      const result = await run("encrypt", "--algo", "caesar", "--in");

      expect(result.code).toBe(EXIT_CODES.USAGE);
      expect(result.stderr[0]).toMatch(/^Error: Option '--in/);
    });
  });
});
