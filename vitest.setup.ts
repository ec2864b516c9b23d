import { Logger } from "agentry-kernel";

// Tests assert on run logs and channel events, not on process output.
Logger.configure({ level: "silent", prettyPrint: false });
