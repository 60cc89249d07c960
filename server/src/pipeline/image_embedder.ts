import { AssemblyError, UpstreamProtocolError } from "../errors.js";

export const DEFAULT_MAX_IMAGE_BYTES = 10 * 1024 * 1024;

export type ImageEmbedderOptions = {
  fetchImpl?: typeof fetch;
  maxBytes?: number;
};

/**
 * Downloads a synthesized image and inlines it as a data URL, so the published document
 * does not depend on the upstream's temporary links. Data URLs pass through unchanged.
 */
export class ImageEmbedder {
  private readonly fetchImpl: typeof fetch;
  private readonly maxBytes: number;

  constructor(options: ImageEmbedderOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_IMAGE_BYTES;
  }

  async embed(url: string, signal?: AbortSignal): Promise<string> {
    if (url.startsWith("data:image/")) return url;
    const failure = `failed to embed image ${url}`;

    let res: Response;
    try {
      res = await this.fetchImpl(url, { signal });
    } catch (err) {
      throw new AssemblyError(failure, err);
    }

    if (!res.ok) {
      const body = await res.text().catch(() => "");
      throw new AssemblyError(failure, new UpstreamProtocolError(`image host returned status ${res.status}`, body, res.status));
    }

    const contentType = (res.headers.get("content-type") ?? "").split(";")[0].trim().toLowerCase();
    if (!contentType.startsWith("image/")) {
      throw new AssemblyError(failure, new UpstreamProtocolError(`unexpected content type "${contentType}"`, contentType, res.status));
    }

    let bytes: Buffer;
    try {
      bytes = Buffer.from(await res.arrayBuffer());
    } catch (err) {
      throw new AssemblyError(failure, err);
    }
    if (bytes.length === 0 || bytes.length > this.maxBytes) {
      throw new AssemblyError(failure, new UpstreamProtocolError(`image size ${bytes.length} is outside 1..${this.maxBytes} bytes`, "", res.status));
    }
    return `data:${contentType};base64,${bytes.toString("base64")}`;
  }
}
