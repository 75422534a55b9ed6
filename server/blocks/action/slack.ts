import { toErrorMessage } from "../../errors.js";
import { readListParameter, readStringParameter } from "../parameters.js";
import { renderTemplate } from "../templates.js";
import type { ActionBlockDefinition } from "../types.js";

const DEFAULT_MESSAGE_TEMPLATE = `*New Item: {{title}}*
> {{description}}

Posted on: {{posted_on}}
<{{url}}|View Original>`;

export const slackBlock: ActionBlockDefinition = {
  type: "action",
  name: "slack",
  label: "Slack",
  version: "1.0",
  description: "Posts a message for each item to a Slack incoming webhook",
  parameters: {
    webhookUrl: {
      type: "string",
      required: true,
      description: "Slack incoming webhook URL"
    },
    messageTemplate: {
      type: "string",
      required: true,
      description: "Message with {{field}} placeholders and Slack markdown",
      default: DEFAULT_MESSAGE_TEMPLATE
    },
    username: {
      type: "string",
      required: false,
      description: "Display name for the bot",
      default: "taskchain"
    },
    iconEmoji: {
      type: "string",
      required: false,
      description: "Emoji used as the bot icon",
      default: ":robot_face:"
    },
    mentionUsers: {
      type: "string",
      required: false,
      description: "Comma-separated mentions placed above the message, e.g. <@U012AB3CD>",
      default: ""
    }
  },
  async execute(item, parameters, context) {
    if (item.isNew === false) {
      return { success: true, message: "Skipped: item is not new", item };
    }

    const mentions = readListParameter(parameters, "mentionUsers");
    const rendered = renderTemplate(readStringParameter(parameters, "messageTemplate"), item, {
      missing: "keep",
      objectFormat: "pretty"
    });
    const text = mentions.length > 0 ? `${mentions.join(" ")}\n${rendered}` : rendered;

    try {
      const response = await context.fetchFn(readStringParameter(parameters, "webhookUrl"), {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          text,
          username: readStringParameter(parameters, "username", "taskchain"),
          icon_emoji: readStringParameter(parameters, "iconEmoji", ":robot_face:"),
          mrkdwn: true
        }),
        signal: context.signal
      });

      if (!response.ok) {
        const error = `Failed to send message to Slack: status ${response.status}`;
        context.log(error);
        return { success: false, error, statusCode: response.status, item };
      }

      return {
        success: true,
        message: "Message sent to Slack",
        statusCode: response.status,
        item
      };
    } catch (error) {
      if (context.signal.aborted) {
        throw error;
      }
      const message = `Failed to send message to Slack: ${toErrorMessage(error)}`;
      context.log(message);
      return { success: false, error: message, item };
    }
  }
};
