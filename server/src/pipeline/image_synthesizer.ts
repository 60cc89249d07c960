import type { SynthesisConfig } from "../config.js";
import { ParseError, SynthesisError, UpstreamAuthError, UpstreamProtocolError } from "../errors.js";
import { SynthesisResponseSchema, type SlideKind, type SynthesisResponse } from "./schemas.js";
import { createSignedRequest, randomNonce, unixSeconds, type SignedRequest } from "./signer.js";
import { takeCodePoints } from "./utils.js";

export type ImageStyle = SlideKind;

export const SYNTHESIS_SUCCESS_CODE = 10000;
export const PROMPT_CHAR_LIMIT = 200;
export const DEFAULT_LOGO_TEXT = "@BytePlus 2025";

const VISUAL_PROMPT_LABEL = /visual prompt:/i;
const EDGE_QUOTES_AND_SPACE = /^[\s"'“”‘’]+|[\s"'“”‘’]+$/g;

export type SynthesisRequestBody = {
  req_key: string;
  prompt: string;
  return_url: true;
  scale: number;
  logo_info: {
    add_logo: boolean;
    position: number;
    language: number;
    opacity: number;
    width: number;
    height: number;
    logo_text_content: string;
  };
};

export type ImageSynthesizerOptions = {
  fetchImpl?: typeof fetch;
  clock?: () => number;
  nonceSource?: () => number;
  logoText?: string;
};

/**
 * Emphasis markers go first, then everything up to each "Visual prompt:" label, then
 * surrounding quotes and whitespace. Applying it twice changes nothing.
 */
export function sanitizePrompt(text: string): string {
  let cleaned = text.replace(/\*/g, "");
  for (let m = VISUAL_PROMPT_LABEL.exec(cleaned); m; m = VISUAL_PROMPT_LABEL.exec(cleaned)) {
    cleaned = cleaned.slice(m.index + m[0].length);
  }
  return cleaned.replace(EDGE_QUOTES_AND_SPACE, "");
}

/** Hard cut; may end mid-word. */
export function truncatePrompt(prompt: string, limit = PROMPT_CHAR_LIMIT): string {
  return takeCodePoints(prompt, limit);
}

export function buildSynthesisBody(reqKey: string, prompt: string, logoText = DEFAULT_LOGO_TEXT): SynthesisRequestBody {
  return {
    req_key: reqKey,
    prompt,
    return_url: true,
    scale: 7.0,
    logo_info: {
      add_logo: true,
      position: 0,
      language: 0,
      opacity: 0.3,
      width: 720,
      height: 1280,
      logo_text_content: logoText
    }
  };
}

export function buildSynthesisUrl(endpoint: string, apiKey: string, signed: SignedRequest): string {
  const url = new URL(endpoint);
  url.searchParams.set("api_key", apiKey);
  url.searchParams.set("timestamp", String(signed.timestampSeconds));
  url.searchParams.set("nonce", String(signed.nonce));
  url.searchParams.set("sign", signed.signature);
  return url.toString();
}

export function parseSynthesisResponse(text: string): SynthesisResponse {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new ParseError("synthesis response is not valid JSON");
  }
  const parsed = SynthesisResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ParseError(
      "synthesis response has an unexpected shape",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/** Returns the first URL the upstream listed or throws the matching upstream error. */
export function firstImageUrl(response: SynthesisResponse): string {
  const upstreamMessage = response.message ?? "Unknown error";
  if (response.code !== SYNTHESIS_SUCCESS_CODE) {
    throw new UpstreamProtocolError(`upstream error code ${response.code}: ${upstreamMessage}`, upstreamMessage, 200);
  }
  const urls = response.data?.image_urls ?? [];
  if (urls.length === 0) throw new UpstreamProtocolError("upstream returned no image urls", upstreamMessage, 200);
  const first = urls[0];
  if (first.trim().length === 0) throw new UpstreamProtocolError("upstream returned a blank image url", upstreamMessage, 200);
  return first;
}

export class ImageSynthesizer {
  private readonly fetchImpl: typeof fetch;
  private readonly clock: () => number;
  private readonly nonceSource: () => number;
  private readonly logoText: string;

  constructor(
    private readonly config: SynthesisConfig,
    options: ImageSynthesizerOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.clock = options.clock ?? unixSeconds;
    this.nonceSource = options.nonceSource ?? randomNonce;
    this.logoText = options.logoText ?? DEFAULT_LOGO_TEXT;
  }

  async synthesize(prompt: string, style: ImageStyle, signal?: AbortSignal): Promise<string> {
    const failure = `failed to synthesize ${style} image`;
    const signed = createSignedRequest(this.config.apiSecret, this.clock, this.nonceSource);

    const cleaned = truncatePrompt(sanitizePrompt(prompt));
    if (cleaned.length === 0) throw new SynthesisError(failure, new ParseError("prompt is empty after sanitization"));

    let status: number;
    let text: string;
    try {
      const res = await this.fetchImpl(buildSynthesisUrl(this.config.endpoint, this.config.apiKey, signed), {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(buildSynthesisBody(this.config.reqKey, cleaned, this.logoText)),
        signal
      });
      status = res.status;
      text = await res.text();
    } catch (err) {
      throw new SynthesisError(failure, err);
    }

    if (status === 401 || status === 403) throw new SynthesisError(failure, new UpstreamAuthError(status, text));
    if (status !== 200) {
      throw new SynthesisError(failure, new UpstreamProtocolError(`upstream returned status ${status}: ${text}`, text, status));
    }

    try {
      return firstImageUrl(parseSynthesisResponse(text));
    } catch (err) {
      throw new SynthesisError(failure, err);
    }
  }
}
