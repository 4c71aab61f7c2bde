import type { RouteDefinition } from "~/.server/http/express-adapter";
import type { RouteModule } from "~/.server/http/route";
import * as transcripts from "./routes/api.transcripts";
import * as transcriptById from "./routes/api.transcripts.$id";
import * as transcriptVerify from "./routes/api.transcripts.$id.verify";
import * as transcriptPublish from "./routes/api.transcripts.$id.publish";
import * as transcriptReport from "./routes/api.transcripts.$id.report";
import * as transcriptExport from "./routes/api.transcripts.$id.export";
import * as transcriptBackup from "./routes/api.transcripts.$id.backup";
import * as storageLocations from "./routes/api.storage-locations";
import * as storageLocationById from "./routes/api.storage-locations.$id";
import * as settings from "./routes/api.settings";

function route(path: string, module: RouteModule): RouteDefinition {
  return { path, module };
}

export default [
  route("api/transcripts", transcripts),
  route("api/transcripts/:id", transcriptById),
  route("api/transcripts/:id/verify", transcriptVerify),
  route("api/transcripts/:id/publish", transcriptPublish),
  route("api/transcripts/:id/report", transcriptReport),
  route("api/transcripts/:id/export", transcriptExport),
  route("api/transcripts/:id/backup", transcriptBackup),

  route("api/storage-locations", storageLocations),
  route("api/storage-locations/:id", storageLocationById),

  route("api/settings", settings),
] satisfies RouteDefinition[];
