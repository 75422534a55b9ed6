import { Resend } from "resend";
import { toErrorMessage } from "../../errors.js";
import { readListParameter, readStringParameter } from "../parameters.js";
import { renderTemplate } from "../templates.js";
import type { ActionBlockDefinition } from "../types.js";

const DEFAULT_BODY_TEMPLATE = `<h2>{{title}}</h2>
<p>{{description}}</p>
<hr>
<p><small>Sent by taskchain</small></p>
`;

export const emailBlock: ActionBlockDefinition = {
  type: "action",
  name: "email",
  label: "Email",
  version: "1.0",
  description: "Sends an email for each item through Resend",
  parameters: {
    apiKey: {
      type: "string",
      required: true,
      description: "Resend API key"
    },
    fromEmail: {
      type: "string",
      required: true,
      description: "Sender address, e.g. Alerts <alerts@example.com>"
    },
    toEmail: {
      type: "string",
      required: true,
      description: "Recipient addresses, comma-separated"
    },
    subjectTemplate: {
      type: "string",
      required: true,
      description: "Subject with {{field}} placeholders",
      default: "New Item: {{title}}"
    },
    bodyTemplate: {
      type: "string",
      required: true,
      description: "HTML body with {{field}} placeholders",
      default: DEFAULT_BODY_TEMPLATE
    }
  },
  async execute(item, parameters, context) {
    if (item.isNew === false) {
      return { success: true, message: "Skipped: item is not new", item };
    }

    const recipients = readListParameter(parameters, "toEmail");
    const subject = renderTemplate(readStringParameter(parameters, "subjectTemplate"), item, {
      missing: "keep",
      objectFormat: "pretty"
    });
    const html = renderTemplate(readStringParameter(parameters, "bodyTemplate"), item, {
      missing: "keep",
      objectFormat: "pretty"
    });

    try {
      const resend = new Resend(readStringParameter(parameters, "apiKey"));
      const { data, error } = await resend.emails.send({
        from: readStringParameter(parameters, "fromEmail"),
        to: recipients,
        subject,
        html
      });

      if (error) {
        context.log(`Email to ${recipients.join(", ")} failed: ${error.message}`);
        return { success: false, error: error.message, item };
      }

      return {
        success: true,
        message: `Email sent to ${recipients.join(", ")}`,
        subject,
        messageId: data?.id ?? null,
        item
      };
    } catch (error) {
      const message = toErrorMessage(error);
      context.log(`Email to ${recipients.join(", ")} failed: ${message}`);
      return { success: false, error: message, item };
    }
  }
};
