import { PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import {
  ANALYSIS_MODES,
  MAX_RECORDING_INTERVAL_SECONDS,
  MIN_RECORDING_INTERVAL_SECONDS
} from "../settings/guildSettings.ts";

export const analyzeCommands = [
  new SlashCommandBuilder()
    .setName("analyze_start")
    .setDescription("Start recording and analyzing your voice channel"),
  new SlashCommandBuilder()
    .setName("analyze_stop")
    .setDescription("Post a final report and leave the voice channel"),
  new SlashCommandBuilder()
    .setName("analyze_now")
    .setDescription("Create a report right away without waiting for the interval")
];

export const settingsCommand = new SlashCommandBuilder()
  .setName("settings")
  .setDescription("Change how this server's discussions are analyzed")
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild)
  .addSubcommand((subcommand) =>
    subcommand
      .setName("set_mode")
      .setDescription("Change the analysis mode")
      .addStringOption((option) =>
        option
          .setName("mode")
          .setDescription("Analysis mode")
          .setRequired(true)
          .addChoices(...ANALYSIS_MODES.map((mode) => ({ name: mode, value: mode })))
      )
  )
  .addSubcommand((subcommand) =>
    subcommand
      .setName("set_interval")
      .setDescription("Change the analysis interval in seconds")
      .addIntegerOption((option) =>
        option
          .setName("seconds")
          .setDescription("Interval in seconds")
          .setRequired(true)
          .setMinValue(MIN_RECORDING_INTERVAL_SECONDS)
          .setMaxValue(MAX_RECORDING_INTERVAL_SECONDS)
      )
  )
  .addSubcommand((subcommand) =>
    subcommand
      .setName("set_key")
      .setDescription("Set this server's Gemini API key (leave empty to clear)")
      .addStringOption((option) =>
        option
          .setName("key")
          .setDescription("Gemini API key")
          .setRequired(false)
      )
  )
  .addSubcommand((subcommand) =>
    subcommand
      .setName("show")
      .setDescription("Show the current settings and recording state")
  );

export const slashCommands = [...analyzeCommands, settingsCommand];

export function slashCommandPayloads() {
  return slashCommands.map((command) => command.toJSON());
}
