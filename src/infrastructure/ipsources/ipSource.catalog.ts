export type IpSourceDefinition = {
  name: string;
  url: string;
  samplesPerCidr: number;
  maxAddresses?: number;
};

const asnSource = (asn: number): IpSourceDefinition => ({
  name: `as${asn}`,
  url: `https://raw.githubusercontent.com/ipverse/asn-ip/master/as/${asn}/ipv4-aggregated.txt`,
  samplesPerCidr: 10
});

export const ipSourceCatalog: Record<string, IpSourceDefinition> = {
  official: { name: "official", url: "https://www.cloudflare.com/ips-v4/", samplesPerCidr: 10, maxAddresses: 1000 },
  cm: { name: "cm", url: "https://raw.githubusercontent.com/cmliu/cmliu/main/CF-CIDR.txt", samplesPerCidr: 10, maxAddresses: 1000 },
  as13335: asnSource(13335),
  as209242: asnSource(209242),
  as24429: asnSource(24429),
  as35916: asnSource(35916),
  as199524: asnSource(199524),
  bestcfv4: {
    name: "bestcfv4",
    url: "https://raw.githubusercontent.com/ymyuuu/IPDB/refs/heads/main/BestCF/bestcfv4.txt",
    samplesPerCidr: 5
  },
  bestali: {
    name: "bestali",
    url: "https://raw.githubusercontent.com/ymyuuu/IPDB/refs/heads/main/BestAli/bestaliv4.txt",
    samplesPerCidr: 5
  },
  cfip: {
    name: "cfip",
    url: "https://raw.githubusercontent.com/qianxiu203/cfipcaiji/refs/heads/main/ip.txt",
    samplesPerCidr: 5
  }
};

export const defaultIpSourceNames = ["official", "as13335", "as209242", "cm"];

export const resolveIpSources = (names: readonly string[]): IpSourceDefinition[] =>
  names.map((name) => {
    const definition = ipSourceCatalog[name];
    if (!definition) {
      throw new Error(`Unknown IP source "${name}". Known sources: ${Object.keys(ipSourceCatalog).join(", ")}`);
    }
    return definition;
  });
