import express, { Response } from 'express';
import cors from 'cors';
import { HandlerResult, listSchemes, renderConfigRequest, renderVectorRequest } from './handlers';

const app = express();
const PORT = Number(process.env.PORT) || 3000;

app.use(cors());
app.use(express.json({ limit: '1mb' }));

function send(res: Response, result: HandlerResult) {
    if ('png' in result) {
        res.status(result.status).type('image/png').send(result.png);
    } else {
        if (result.status >= 500) {
            console.error('Render error:', result.json.error);
        }
        res.status(result.status).json(result.json);
    }
}

// API: Available colour schemes and colour maps
app.get('/api/schemes', (_req, res) => {
    send(res, listSchemes());
});

// API: Render a full configuration
app.post('/api/render', (req, res, next) => {
    renderConfigRequest(req.body).then(result => send(res, result), next);
});

// API: Render a feature vector through a colour scheme (preview size by default)
app.post('/api/render/vector', (req, res, next) => {
    renderVectorRequest(req.body).then(result => send(res, result), next);
});

app.listen(PORT, () => {
    console.log(`Flow field preview server running at http://localhost:${PORT}`);
});
