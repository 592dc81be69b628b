import { config } from "dotenv";
import { type AppConfig, OPERATIONS, type Operation, loadConfig, parseOperations } from "./config";
import { crawlDepartments, crawlInstitutes, crawlPrograms } from "./crawl";
import { PortalFetcher, RetryBudget, createNtlmSessionFactory, createPause } from "./fetcher";
import { generateGrades, generateGroups, generateStudents } from "./generator";
import { correctSubjects } from "./inference";
import { allocateScholarships } from "./scholarships";
import { Store } from "./store";
import { crawlSubjects } from "./subjects";

type Stage = () => Promise<unknown> | unknown;

// Operation flags given on the command line, e.g. --institutes, --data-correction or --all
export function parseArgs(argv: string[]): Set<Operation> {
  const flags = argv.filter((a) => a.startsWith("--")).map((a) => a.slice(2));
  return flags.length === 0 ? new Set() : parseOperations(flags.join(","));
}

export async function run(settings: AppConfig): Promise<void> {
  const store = new Store(settings.dbPath);
  try {
    store.bootstrap();
    const budget = new RetryBudget(settings.retryLimit);
    const createSession = createNtlmSessionFactory(settings.certificatePath);
    const pause = createPause(settings.pauseMs);

    const crawlContext = () => {
      const [first] = settings.credentials;
      if (!first) throw new Error("No portal credentials configured (PORTAL_USERNAME / PORTAL_PASSWORD)");
      return { store, source: new PortalFetcher(first, budget, createSession), baseUrl: settings.mainUrl, pause };
    };

    const stages: Record<Operation, Stage> = {
      institutes: () => crawlInstitutes(crawlContext()),
      departments: () => crawlDepartments(crawlContext()),
      programs: () => crawlPrograms(crawlContext()),
      subjects: () =>
        crawlSubjects(store, {
          credentials: settings.credentials,
          createSource: (credentials) => new PortalFetcher(credentials, budget, createSession),
          openReader: () => new Store(settings.dbPath, { readonly: true }),
          pause,
        }),
      "data correction": () => correctSubjects(store),
      "students generator": () => {
        generateGroups(store.db);
        generateStudents(store.db, settings.generator);
        generateGrades(store.db, settings.generator);
        allocateScholarships(store.db, settings.generator);
      },
    };

    for (const operation of OPERATIONS) {
      if (!settings.operations.has(operation)) {
        console.log(`Unable to request "${operation}": permission is missing`);
        continue;
      }
      console.log(`Running "${operation}"...`);
      await stages[operation]();
    }
  } finally {
    store.close();
  }
}

async function main() {
  config();
  const settings = loadConfig();
  for (const op of parseArgs(process.argv.slice(2))) settings.operations.add(op);
  await run(settings);
}

if (require.main === module) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
