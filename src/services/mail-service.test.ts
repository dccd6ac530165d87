import { describe, it, expect, vi, afterEach } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import nodemailer from "nodemailer";
import { MailService, MailTransport, ReportMessage } from "./mail-service";
import type { MailConfig } from "../config/config";

// ============================================================================
// Test Helpers
// ============================================================================

function createMailConfig(overrides: Partial<MailConfig> = {}): MailConfig {
  return {
    to: ["dispatch@example.com"],
    from: "shift-report@example.com",
    subject: "Shift work items",
    greeting: "Hello team",
    closing: "Thanks,",
    mode: "smtp",
    draftDirectory: "./drafts",
    smtp: { host: "localhost", port: 25, secure: false, user: null, password: null },
    ...overrides,
  };
}

const message: ReportMessage = {
  to: ["dispatch@example.com", "yard@example.com"],
  subject: "Shift work items - morning shift",
  html: "<p>Hello team</p>",
};

const tempDirectories: string[] = [];

afterEach(async () => {
  await Promise.all(
    tempDirectories.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true }))
  );
});

// ============================================================================
// Tests
// ============================================================================

describe("MailService", () => {
  describe("send", () => {
    it("hands the composed message to the transport", async () => {
      const sendMail = vi.fn(async () => ({ messageId: "<report-1@example.com>" }));
      const service = new MailService(createMailConfig(), { sendMail });

      const result = await service.send(message);

      expect(result).toEqual({ ok: true, value: "<report-1@example.com>" });
      expect(sendMail).toHaveBeenCalledWith({
        from: "shift-report@example.com",
        to: "dispatch@example.com, yard@example.com",
        subject: "Shift work items - morning shift",
        html: "<p>Hello team</p>",
      });
    });

    it("works with a real nodemailer transporter", async () => {
      const transport: MailTransport = nodemailer.createTransport({ jsonTransport: true });
      const service = new MailService(createMailConfig(), transport);

      const result = await service.send(message);

      expect(result.ok).toBe(true);
    });

    it("returns a mail error when the transport rejects", async () => {
      const transport: MailTransport = {
        sendMail: async () => {
          throw new Error("connect ECONNREFUSED 127.0.0.1:25");
        },
      };
      const service = new MailService(createMailConfig(), transport);

      const result = await service.send(message);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.name).toBe("MailError");
        expect(result.error.message).toBe(
          "Failed to send mail: connect ECONNREFUSED 127.0.0.1:25"
        );
      }
    });
  });

  describe("saveDraft", () => {
    it("writes an unsent .eml draft into the draft directory", async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), "shift-report-"));
      tempDirectories.push(dir);
      const draftDirectory = path.join(dir, "drafts");
      const service = new MailService(createMailConfig({ draftDirectory }), {
        sendMail: vi.fn(),
      });

      const result = await service.saveDraft(message, new Date("2026-10-19T05:30:00Z"));

      expect(result).toEqual({
        ok: true,
        value: path.join(draftDirectory, "shift-report-2026-10-19T05-30-00-000Z.eml"),
      });
      if (result.ok) {
        const eml = await fs.readFile(result.value, "utf-8");
        expect(eml).toContain("X-Unsent: 1");
        expect(eml).toContain("Subject: Shift work items - morning shift");
        expect(eml).toContain("To: dispatch@example.com, yard@example.com");
      }
    });
  });

  describe("deliver", () => {
    it("sends through the transport in smtp mode", async () => {
      const sendMail = vi.fn(async () => ({ messageId: "<report-2@example.com>" }));
      const service = new MailService(createMailConfig({ mode: "smtp" }), { sendMail });

      const result = await service.deliver(message);

      expect(result).toEqual({ ok: true, value: "<report-2@example.com>" });
      expect(sendMail).toHaveBeenCalledTimes(1);
    });

    it("writes a draft instead of sending in draft mode", async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), "shift-report-"));
      tempDirectories.push(dir);
      const sendMail = vi.fn();
      const service = new MailService(
        createMailConfig({ mode: "draft", draftDirectory: dir }),
        { sendMail }
      );

      const result = await service.deliver(message);

      expect(result.ok).toBe(true);
      expect(sendMail).not.toHaveBeenCalled();
    });
  });
});
