import express from 'express';
import cors from 'cors';
import { loadConfig } from './config';
import { Importer } from './data/importer';
import { Planner } from './data/planner';
import { createRoutes } from './server/routes';

const config = loadConfig();
const app = express();

// imports the gtfs files
const store = Importer.importScheduleData(config.gtfsDirectory);
// builds the graph of the planning session
const graph = Planner.loadGraph(store, config);

const corsOptions = {
  origin: config.corsOrigin,
  optionsSuccessStatus: 200 // some legacy browsers (IE11, various SmartTVs) choke on 204 
}
app.use(cors(corsOptions));

// uses the defined routes
app.use(createRoutes(graph, config));

// initializes the http port of the backend
app.listen(config.port, () => {
  return console.log(`server is listening on ${config.port}`);
});
