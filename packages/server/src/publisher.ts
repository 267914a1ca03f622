import { ActivityType, type ActivityOptions } from "discord.js";
import { PublishError, errorMessage } from "./errors.js";

/** Where the monitor's status ends up. */
export interface Publisher {
  setStatusText(text: string): Promise<void>;
  setAvatarImage(imagePath: string): Promise<void>;
}

/** The slice of a discord.js `Client` the publisher touches. */
export interface PresenceClient {
  user: {
    setActivity(name: string, options?: Omit<ActivityOptions, "name">): unknown;
    setAvatar(avatar: string): Promise<unknown>;
  } | null;
}

/**
 * Publishes to the bot's own Discord profile: the status becomes a
 * "Playing ..." activity and the image becomes the avatar.
 */
export class DiscordPublisher implements Publisher {
  constructor(private readonly client: PresenceClient) {}

  private get user() {
    const user = this.client.user;
    if (!user) {
      throw new PublishError("Discord client is not logged in");
    }
    return user;
  }

  async setStatusText(text: string): Promise<void> {
    const user = this.user;
    try {
      user.setActivity(text, { type: ActivityType.Playing });
    } catch (err) {
      throw new PublishError(`Could not set activity: ${errorMessage(err)}`, { cause: err });
    }
  }

  async setAvatarImage(imagePath: string): Promise<void> {
    const user = this.user;
    try {
      await user.setAvatar(imagePath);
    } catch (err) {
      throw new PublishError(`Could not set avatar: ${errorMessage(err)}`, { cause: err });
    }
  }
}
