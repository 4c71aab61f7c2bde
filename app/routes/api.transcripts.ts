import { z } from "zod";
import type { RouteArgs } from "~/.server/http/route";
import { errorResponse, methodNotAllowed, readJsonBody } from "~/.server/http/route";
import { getTranscriptManager, ImportTranscriptSchema } from "~/.server/transcripts";
import { getLogger } from "~/.server/log/logger";

const log = getLogger({ module: "ApiTranscripts" });

const ListQuerySchema = z.object({
  sort: z.enum(["importedAt", "createdAt", "title"]).optional(),
  order: z.enum(["asc", "desc"]).optional(),
});

export async function loader({ request }: RouteArgs) {
  try {
    const url = new URL(request.url);
    const query = ListQuerySchema.parse(Object.fromEntries(url.searchParams));
    const transcripts = getTranscriptManager().listTranscripts({
      sortBy: query.sort,
      order: query.order,
    });

    return Response.json({ transcripts });
  } catch (error) {
    return errorResponse(error, log, "Failed to list transcripts");
  }
}

export async function action({ request }: RouteArgs) {
  if (request.method !== "POST") {
    return methodNotAllowed(request);
  }

  try {
    const input = ImportTranscriptSchema.parse(await readJsonBody(request));
    const transcript = await getTranscriptManager().importTranscript(input);

    return Response.json(transcript, { status: 201 });
  } catch (error) {
    return errorResponse(error, log, "Failed to import transcript");
  }
}
