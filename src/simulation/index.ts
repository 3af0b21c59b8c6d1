// src/simulation/index.ts

import { runSimulation } from './runDaySimulation';

runSimulation();
