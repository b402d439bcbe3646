export const KEEL_NAME = "keel"
export const KEEL_VERSION = "0.1.0"
