import {
  Client,
  Events,
  GatewayIntentBits,
  MessageFlags,
  type ChatInputCommandInteraction,
  type InteractionReplyOptions
} from "discord.js";
import type { AnalysisClient } from "./analysis/analysisClient.ts";
import type { AppConfig } from "./config.ts";
import {
  ALREADY_RUNNING_TEXT,
  GUILD_ONLY_TEXT,
  JOIN_VOICE_FIRST_TEXT,
  MANUAL_ANALYSIS_TEXT,
  MISSING_KEY_TEXT,
  NOT_RUNNING_START_FIRST_TEXT,
  NOT_RUNNING_TEXT,
  STOPPING_TEXT,
  applySettingsCommand,
  buildStartReply,
  buildStopFollowUp,
  describeAnalysisOutcome,
  type CommandReply,
  type SettingsCommandInput
} from "./discord/commandHandlers.ts";
import { slashCommandPayloads } from "./discord/commands.ts";
import { DiscordReportPublisher } from "./discord/reportPublisher.ts";
import { SessionManager } from "./session/sessionManager.ts";
import type { Store } from "./store.ts";
import { errorMessage } from "./utils.ts";
import { createVoiceCapture } from "./voice/voiceCapture.ts";

type GuildCommandInteraction = ChatInputCommandInteraction<"cached">;

const COMMAND_FAILED_TEXT = "❌ Something went wrong while running this command.";

type InsightBotOptions = {
  appConfig: AppConfig;
  store: Store;
  createAnalysisClient: (apiKey: string) => AnalysisClient;
};

export class InsightBot {
  appConfig: AppConfig;
  store: Store;
  client: Client;
  manager: SessionManager;
  isStopping: boolean;

  constructor({ appConfig, store, createAnalysisClient }: InsightBotOptions) {
    this.appConfig = appConfig;
    this.store = store;
    this.isStopping = false;

    this.client = new Client({
      intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildVoiceStates]
    });
    this.manager = new SessionManager({
      store,
      publisher: new DiscordReportPublisher({ client: this.client }),
      createAnalysisClient,
      fallbackApiKey: appConfig.geminiApiKey,
      tempDir: appConfig.tempAudioDir
    });

    this.registerEvents();
  }

  registerEvents() {
    this.client.once(Events.ClientReady, (client) => {
      console.log(`Logged in as ${client.user.tag}`);
      const guildId = this.appConfig.devGuildId;
      const registration = guildId
        ? client.application.commands.set(slashCommandPayloads(), guildId)
        : client.application.commands.set(slashCommandPayloads());
      registration
        .then((commands) => {
          this.store.logAction({
            kind: "bot_commands_registered",
            guildId,
            userId: client.user.id,
            content: "slash_commands_registered",
            metadata: { count: commands.size, scope: guildId ? "guild" : "global" }
          });
        })
        .catch((error: unknown) => {
          this.store.logAction({
            kind: "bot_error",
            guildId,
            userId: client.user.id,
            content: `command_registration: ${errorMessage(error)}`
          });
        });
    });

    this.client.on(Events.ShardDisconnect, (event, shardId) => {
      this.store.logAction({
        kind: "bot_error",
        userId: this.client.user?.id,
        content: `gateway_shard_disconnect: shard=${shardId} code=${event.code}`
      });
    });

    this.client.on(Events.ShardError, (error, shardId) => {
      this.store.logAction({
        kind: "bot_error",
        userId: this.client.user?.id,
        content: `gateway_shard_error: shard=${shardId} ${errorMessage(error)}`
      });
    });

    this.client.on(Events.Error, (error) => {
      this.store.logAction({
        kind: "bot_error",
        userId: this.client.user?.id,
        content: `gateway_error: ${errorMessage(error)}`
      });
    });

    this.client.on(Events.InteractionCreate, async (interaction) => {
      if (!interaction.isChatInputCommand()) return;
      try {
        await this.handleCommand(interaction);
      } catch (error) {
        this.store.logAction({
          kind: "bot_error",
          guildId: interaction.guildId,
          channelId: interaction.channelId,
          userId: interaction.user.id,
          content: `command_failed: /${interaction.commandName} ${errorMessage(error)}`
        });
        await this.respond(interaction, { content: COMMAND_FAILED_TEXT, ephemeral: true }).catch((replyError: unknown) => {
          this.store.logAction({
            kind: "bot_error",
            guildId: interaction.guildId,
            channelId: interaction.channelId,
            content: `command_error_reply: ${errorMessage(replyError)}`
          });
        });
      }
    });
  }

  async start() {
    this.isStopping = false;
    await this.client.login(this.appConfig.discordToken);
  }

  async stop() {
    this.isStopping = true;
    const results = await this.manager.stopAll("shutdown");
    this.store.logAction({
      kind: "bot_shutdown",
      content: "sessions_stopped",
      metadata: { sessions: results.length }
    });
    await this.client.destroy();
  }

  async respond(interaction: ChatInputCommandInteraction, reply: CommandReply) {
    const payload: InteractionReplyOptions = {
      content: reply.content,
      allowedMentions: { parse: [] },
      flags: reply.ephemeral ? MessageFlags.Ephemeral : undefined
    };
    if (interaction.deferred) {
      await interaction.editReply({ content: reply.content, allowedMentions: { parse: [] } });
      return;
    }
    if (interaction.replied) {
      await interaction.followUp(payload);
      return;
    }
    await interaction.reply(payload);
  }

  async handleCommand(interaction: ChatInputCommandInteraction) {
    if (!interaction.inCachedGuild()) {
      await this.respond(interaction, { content: GUILD_ONLY_TEXT, ephemeral: true });
      return;
    }
    if (this.isStopping) {
      await this.respond(interaction, { content: "The bot is shutting down.", ephemeral: true });
      return;
    }

    switch (interaction.commandName) {
      case "analyze_start":
        await this.handleAnalyzeStart(interaction);
        return;
      case "analyze_stop":
        await this.handleAnalyzeStop(interaction);
        return;
      case "analyze_now":
        await this.handleAnalyzeNow(interaction);
        return;
      case "settings":
        await this.handleSettings(interaction);
        return;
      default:
        await this.respond(interaction, { content: "Unknown command.", ephemeral: true });
    }
  }

  async handleAnalyzeStart(interaction: GuildCommandInteraction) {
    const guildId = interaction.guildId;
    const voiceChannel = interaction.member.voice.channel;
    if (!voiceChannel) {
      await this.respond(interaction, { content: JOIN_VOICE_FIRST_TEXT, ephemeral: true });
      return;
    }
    if (this.manager.hasSession(guildId)) {
      await this.respond(interaction, { content: ALREADY_RUNNING_TEXT, ephemeral: true });
      return;
    }
    if (!this.manager.resolveApiKey(guildId)) {
      await this.respond(interaction, { content: MISSING_KEY_TEXT, ephemeral: true });
      return;
    }

    await interaction.deferReply();
    const result = await this.manager.startSession({
      guildId,
      textChannelId: interaction.channelId,
      voiceChannelId: voiceChannel.id,
      requestedByUserId: interaction.user.id,
      openCapture: createVoiceCapture({
        guild: interaction.guild,
        voiceChannelId: voiceChannel.id,
        botUserId: this.client.user?.id ?? null,
        store: this.store,
        onConnectionLost: () => this.handleConnectionLost(guildId)
      })
    });
    await this.respond(interaction, buildStartReply(result, voiceChannel.name));
  }

  async handleAnalyzeStop(interaction: GuildCommandInteraction) {
    if (!this.manager.hasSession(interaction.guildId)) {
      await this.respond(interaction, { content: NOT_RUNNING_TEXT, ephemeral: true });
      return;
    }

    await this.respond(interaction, { content: STOPPING_TEXT, ephemeral: false });
    const result = await this.manager.stopSession(interaction.guildId, "command");
    await this.respond(interaction, { content: buildStopFollowUp(result), ephemeral: false });
  }

  async handleAnalyzeNow(interaction: GuildCommandInteraction) {
    if (!this.manager.hasSession(interaction.guildId)) {
      await this.respond(interaction, { content: NOT_RUNNING_START_FIRST_TEXT, ephemeral: true });
      return;
    }

    await this.respond(interaction, { content: MANUAL_ANALYSIS_TEXT, ephemeral: false });
    const result = await this.manager.forceAnalysis(interaction.guildId);
    const note = describeAnalysisOutcome(result);
    if (note) {
      await this.respond(interaction, { content: note, ephemeral: false });
    }
  }

  async handleSettings(interaction: GuildCommandInteraction) {
    const input = readSettingsInput(interaction);
    if (!input) {
      await this.respond(interaction, { content: "Unknown subcommand.", ephemeral: true });
      return;
    }

    const reply = applySettingsCommand({
      store: this.store,
      guildId: interaction.guildId,
      input,
      fallbackApiKey: this.appConfig.geminiApiKey,
      runtimeState: this.manager.getRuntimeState(interaction.guildId)
    });
    this.store.logAction({
      kind: "bot_settings_command",
      guildId: interaction.guildId,
      channelId: interaction.channelId,
      userId: interaction.user.id,
      content: `settings_${input.subcommand}`
    });
    await this.respond(interaction, reply);
  }

  handleConnectionLost(guildId: string) {
    this.manager.stopSession(guildId, "voice_disconnected").catch((error: unknown) => {
      this.store.logAction({
        kind: "bot_error",
        guildId,
        content: `voice_disconnect_stop: ${errorMessage(error)}`
      });
    });
  }
}

function readSettingsInput(interaction: GuildCommandInteraction): SettingsCommandInput | null {
  const subcommand = interaction.options.getSubcommand(true);
  switch (subcommand) {
    case "set_mode":
      return { subcommand, mode: interaction.options.getString("mode") };
    case "set_interval":
      return { subcommand, seconds: interaction.options.getInteger("seconds") };
    case "set_key":
      return { subcommand, key: interaction.options.getString("key") };
    case "show":
      return { subcommand };
    default:
      return null;
  }
}
