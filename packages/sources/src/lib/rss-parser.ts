import Parser from "rss-parser";

const parser = new Parser();

export type ParsedFeed = Awaited<ReturnType<Parser["parseString"]>>;

export function parseFeed(xml: string): Promise<ParsedFeed> {
  return parser.parseString(xml);
}
