import { app } from '@azure/functions';

app.setup({
    enableHttpStream: true,
});

// Each module registers its HTTP function
import './functions/tools.js';
import './functions/toolsStream.js';
import './functions/mcp.js';
import './functions/health.js';
import './functions/ready.js';
