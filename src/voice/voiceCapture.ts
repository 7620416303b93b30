import {
  EndBehaviorType,
  VoiceConnectionStatus,
  entersState,
  joinVoiceChannel,
  type AudioReceiveStream,
  type VoiceConnection
} from "@discordjs/voice";
import type { Guild } from "discord.js";
import prism from "prism-media";
import type { CaptureHandle } from "../session/guildSession.ts";
import type { CaptureEvents, OpenCapture } from "../session/sessionManager.ts";
import type { ActionLog } from "../store.ts";
import { errorMessage } from "../utils.ts";
import { CAPTURE_CHANNELS, CAPTURE_SAMPLE_RATE } from "../audio/audioFiles.ts";

const VOICE_READY_TIMEOUT_MS = 15_000;
const VOICE_RECONNECT_GRACE_MS = 5_000;
const SPEECH_END_SILENCE_MS = 1_000;
const OPUS_FRAME_SIZE = 960;

type UserStream = {
  opusStream: AudioReceiveStream;
  decoder: InstanceType<typeof prism.opus.Decoder>;
};

type VoiceCaptureOptions = {
  guild: Guild;
  voiceChannelId: string;
  botUserId: string | null;
  store: ActionLog;
  onConnectionLost?: () => void;
};

export class VoiceCapture implements CaptureHandle {
  readonly guild: Guild;
  readonly connection: VoiceConnection;
  private readonly events: CaptureEvents;
  private readonly botUserId: string | null;
  private readonly store: ActionLog;
  private readonly streams: Map<string, UserStream>;
  private readonly identifiedUserIds: Set<string>;
  private released: boolean;
  private readonly onSpeakingStart: (userId: string) => void;

  constructor({
    guild,
    connection,
    events,
    botUserId,
    store
  }: {
    guild: Guild;
    connection: VoiceConnection;
    events: CaptureEvents;
    botUserId: string | null;
    store: ActionLog;
  }) {
    this.guild = guild;
    this.connection = connection;
    this.events = events;
    this.botUserId = botUserId;
    this.store = store;
    this.streams = new Map();
    this.identifiedUserIds = new Set();
    this.released = false;
    this.onSpeakingStart = (userId) => this.subscribe(String(userId));
    this.connection.receiver.speaking.on("start", this.onSpeakingStart);
  }

  subscribe(userId: string) {
    if (this.released || !userId || userId === this.botUserId) return;
    if (this.streams.has(userId)) return;

    this.identify(userId);

    const opusStream = this.connection.receiver.subscribe(userId, {
      end: {
        behavior: EndBehaviorType.AfterSilence,
        duration: SPEECH_END_SILENCE_MS
      }
    });
    const decoder = new prism.opus.Decoder({
      rate: CAPTURE_SAMPLE_RATE,
      channels: CAPTURE_CHANNELS,
      frameSize: OPUS_FRAME_SIZE
    });
    this.streams.set(userId, { opusStream, decoder });

    decoder.on("data", (chunk: Buffer) => {
      this.events.onFragment(userId, chunk);
    });

    const cleanup = () => this.dropStream(userId, opusStream);
    opusStream.once("end", cleanup);
    opusStream.once("close", cleanup);
    opusStream.on("error", (error) => {
      this.store.logAction({
        kind: "capture_error",
        guildId: this.guild.id,
        userId,
        content: `opus_stream_error: ${errorMessage(error)}`
      });
      cleanup();
    });
    decoder.on("error", (error) => {
      this.store.logAction({
        kind: "capture_error",
        guildId: this.guild.id,
        userId,
        content: `opus_decode_error: ${errorMessage(error)}`
      });
      cleanup();
    });

    opusStream.pipe(decoder);
  }

  identify(userId: string) {
    if (this.identifiedUserIds.has(userId)) return;
    this.identifiedUserIds.add(userId);

    this.guild.members
      .fetch(userId)
      .then((member) => {
        this.events.onSpeakerIdentified(userId, member.displayName);
      })
      .catch((error: unknown) => {
        this.identifiedUserIds.delete(userId);
        this.store.logAction({
          kind: "capture_error",
          guildId: this.guild.id,
          userId,
          content: `member_lookup_failed: ${errorMessage(error)}`
        });
      });
  }

  dropStream(userId: string, opusStream: AudioReceiveStream) {
    const current = this.streams.get(userId);
    if (!current || current.opusStream !== opusStream) return;
    this.streams.delete(userId);
    current.opusStream.unpipe(current.decoder);
    current.decoder.end();
  }

  get activeStreams() {
    return this.streams.size;
  }

  release() {
    if (this.released) return;
    this.released = true;
    this.connection.receiver.speaking.off("start", this.onSpeakingStart);
    for (const { opusStream, decoder } of this.streams.values()) {
      opusStream.destroy();
      decoder.destroy();
    }
    this.streams.clear();
    if (this.connection.state.status !== VoiceConnectionStatus.Destroyed) {
      this.connection.destroy();
    }
  }
}

function watchConnection({
  connection,
  guildId,
  store,
  onConnectionLost
}: {
  connection: VoiceConnection;
  guildId: string;
  store: ActionLog;
  onConnectionLost?: () => void;
}) {
  connection.on(VoiceConnectionStatus.Disconnected, () => {
    Promise.race([
      entersState(connection, VoiceConnectionStatus.Signalling, VOICE_RECONNECT_GRACE_MS),
      entersState(connection, VoiceConnectionStatus.Connecting, VOICE_RECONNECT_GRACE_MS)
    ]).catch(() => {
      store.logAction({
        kind: "capture_error",
        guildId,
        content: "voice_connection_lost"
      });
      onConnectionLost?.();
    });
  });
}

export function createVoiceCapture({
  guild,
  voiceChannelId,
  botUserId,
  store,
  onConnectionLost
}: VoiceCaptureOptions): OpenCapture {
  return async (events) => {
    const connection = joinVoiceChannel({
      channelId: voiceChannelId,
      guildId: guild.id,
      adapterCreator: guild.voiceAdapterCreator,
      selfDeaf: false,
      selfMute: true
    });

    try {
      await entersState(connection, VoiceConnectionStatus.Ready, VOICE_READY_TIMEOUT_MS);
    } catch (error) {
      connection.destroy();
      throw error;
    }

    watchConnection({ connection, guildId: guild.id, store, onConnectionLost });
    store.logAction({
      kind: "capture_started",
      guildId: guild.id,
      channelId: voiceChannelId,
      content: "voice_capture_started"
    });

    return new VoiceCapture({ guild, connection, events, botUserId, store });
  };
}
