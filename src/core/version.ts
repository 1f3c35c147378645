// Written into every artifact header as jaunt:tool_version.
export const JAUNT_VERSION = "0.3.0";
