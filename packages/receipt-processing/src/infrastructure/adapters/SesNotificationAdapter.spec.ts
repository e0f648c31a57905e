import { ok, unwrap } from "@receipt-pipeline/types";
import { SESClient } from "../clients/SESClient.js";
import { LogNotificationAdapter } from "./LogNotificationAdapter.js";
import { SesNotificationAdapter } from "./SesNotificationAdapter.js";

const message = {
  subject: "Receipt processed: Shop on 2024-03-01 (Total 1.00)",
  textBody: "text",
  htmlBody: "<p>html</p>",
};

describe("SesNotificationAdapter", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should send from the configured sender to the single recipient", async () => {
    const sesClient = new SESClient("eu-west-1");
    const sendEmail = jest
      .spyOn(sesClient, "sendEmail")
      .mockResolvedValue(ok("msg-1"));
    const adapter = new SesNotificationAdapter(
      sesClient,
      "sender@example.com",
      "recipient@example.com",
    );

    const result = await adapter.send(message);

    expect(unwrap(result)).toBe("msg-1");
    expect(sendEmail).toHaveBeenCalledWith({
      source: "sender@example.com",
      toAddresses: ["recipient@example.com"],
      subject: message.subject,
      textBody: "text",
      htmlBody: "<p>html</p>",
    });
  });
});

describe("LogNotificationAdapter", () => {
  it("should succeed with a generated message id", async () => {
    const adapter = new LogNotificationAdapter("recipient@example.com");

    const messageId = unwrap(await adapter.send(message));

    expect(messageId).toMatch(/^log-[0-9a-f-]{36}$/);
    expect(adapter.getProviderName()).toBe("Log");
  });
});
