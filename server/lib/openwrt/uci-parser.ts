// UCI Output Parser
// Parses `uci show <config>` output into sections

export interface UCISection {
  type: string;
  name: string;
  options: Record<string, string | string[]>;
}

/**
 * Split a shown value into its words. Lists print as `'a' 'b'`.
 */
function parseShownValue(raw: string): string | string[] {
  const words = raw.match(/'[^']*'|"[^"]*"|\S+/g) ?? [];
  const values = words.map((word) =>
    (word.startsWith("'") && word.endsWith("'")) || (word.startsWith('"') && word.endsWith('"'))
      ? word.slice(1, -1)
      : word
  );
  if (values.length === 0) return "";
  return values.length === 1 ? values[0] : values;
}

/**
 * Parse UCI show output into sections, in the order they appear.
 * Input format: config.section=type and config.section.option='value'
 */
export function parseUCIShow(output: string): UCISection[] {
  const sections = new Map<string, UCISection>();

  const sectionFor = (name: string): UCISection => {
    let section = sections.get(name);
    if (!section) {
      section = { type: "", name, options: {} };
      sections.set(name, section);
    }
    return section;
  };

  for (const line of output.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) continue;

    const parts = trimmed.substring(0, eqIdx).split(".");
    const value = parseShownValue(trimmed.substring(eqIdx + 1));

    if (parts.length === 2) {
      // Section declaration, e.g. ttyd.core=ttyd
      sectionFor(parts[1]).type = Array.isArray(value) ? value.join(" ") : value;
    } else if (parts.length === 3) {
      sectionFor(parts[1]).options[parts[2]] = value;
    }
  }

  return [...sections.values()];
}

/**
 * Read a single-valued option, undefined when missing
 */
export function getOption(section: UCISection | undefined, option: string): string | undefined {
  const value = section?.options[option];
  return Array.isArray(value) ? value[0] : value;
}
