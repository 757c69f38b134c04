import { config } from "dotenv";
import { expand } from "dotenv-expand";

// Imported first by the entry point so monitoring and logging see .env values.
expand(config());
