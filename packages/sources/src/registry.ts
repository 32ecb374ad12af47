import {
  APNewsSource,
  AustinChronicleSource,
  BBCSource,
  BlockClubChicagoSource,
  DoorCountyPulseSource,
  FolioWeeklySource,
  GambitSource,
  GoogleNewsSource,
  GothamistSource,
  IExaminerSource,
  LATacoSource,
  Magazine303Source,
  MiamiLivingSource,
  ReutersSource,
  SlugMagSource,
  STLMagSource,
  UrbanMilwaukeeSource
} from "./adapters/index.js";
import { InvalidUrlError } from "./canonical-url.js";
import {
  describeSource,
  type NewsSource,
  type SourceDescriptor,
  type SourceOptions
} from "./types.js";

export type RegistryEntry = {
  source: NewsSource;
  /** Hosts owned by the source, without a `www.` prefix. */
  domains: readonly string[];
};

/**
 * Host table used to route a raw article URL to its adapter. Subdomains are
 * listed explicitly; there is no suffix matching.
 */
export const SOURCE_DOMAINS: Readonly<Record<string, readonly string[]>> = {
  apnews: ["apnews.com"],
  bbc: ["bbc.com", "bbc.co.uk"],
  reuters: ["reuters.com"],
  austinchronicle: ["austinchronicle.com"],
  doorcountypulse: ["doorcountypulse.com"],
  urbanmilwaukee: ["urbanmilwaukee.com"],
  lataco: ["lataco.com"],
  stlmag: ["stlmag.com"],
  blockclubchicago: ["blockclubchicago.org"],
  gothamist: ["gothamist.com"],
  miamiliving: ["miamilivingmagazine.com"],
  "303magazine": ["303magazine.com"],
  iexaminer: ["iexaminer.org"],
  gambit: ["nola.com"],
  slugmag: ["slugmag.com"],
  folioweekly: ["folioweekly.com"],
  googlenews: ["news.google.com"]
};

export class SourceRegistry {
  private readonly byKey = new Map<string, NewsSource>();
  private readonly byDomain = new Map<string, NewsSource>();

  constructor(entries: readonly RegistryEntry[]) {
    for (const { source, domains } of entries) {
      const key = source.key.toLowerCase();
      if (this.byKey.has(key)) {
        throw new Error(`Duplicate source key: ${source.key}`);
      }
      this.byKey.set(key, source);

      for (const domain of domains) {
        const host = stripWww(domain.toLowerCase());
        if (this.byDomain.has(host)) {
          throw new Error(`Domain ${host} is claimed by more than one source`);
        }
        this.byDomain.set(host, source);
      }
    }
  }

  get(key: string): NewsSource | undefined {
    return this.byKey.get(key.toLowerCase());
  }

  /**
   * Owning adapter of an article URL, matched on the host with and without
   * a leading `www.`.
   */
  getByUrl(url: string): NewsSource | undefined {
    let host: string;
    try {
      host = new URL(url.trim()).hostname.toLowerCase();
    } catch (error) {
      throw new InvalidUrlError(url, { cause: error });
    }

    return this.byDomain.get(host) ?? this.byDomain.get(stripWww(host));
  }

  list(): SourceDescriptor[] {
    return [...this.byKey.values()].map(describeSource);
  }

  listWithLocation(): SourceDescriptor[] {
    return this.list().filter((descriptor) => descriptor.location !== null);
  }

  keys(): string[] {
    return [...this.byKey.keys()];
  }
}

function stripWww(host: string) {
  return host.startsWith("www.") ? host.slice(4) : host;
}

export function createDefaultSources(options: SourceOptions = {}): NewsSource[] {
  return [
    new APNewsSource(options),
    new BBCSource(options),
    new ReutersSource(options),
    new AustinChronicleSource(options),
    new DoorCountyPulseSource(options),
    new UrbanMilwaukeeSource(options),
    new LATacoSource(options),
    new STLMagSource(options),
    new BlockClubChicagoSource(options),
    new GothamistSource(options),
    new MiamiLivingSource(options),
    new Magazine303Source(options),
    new IExaminerSource(options),
    new GambitSource(options),
    new SlugMagSource(options),
    new FolioWeeklySource(options),
    new GoogleNewsSource(options)
  ];
}

export function createDefaultRegistry(options: SourceOptions = {}) {
  return new SourceRegistry(
    createDefaultSources(options).map((source) => ({
      source,
      domains: SOURCE_DOMAINS[source.key] ?? []
    }))
  );
}
