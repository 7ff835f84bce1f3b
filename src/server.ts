import { createApp } from './app';
import { config } from './config';
import { createImportManager, createStorage } from './context';

const storage = createStorage(config);
const app = createApp({
    exportDir: config.exportDir,
    storage,
    importer: () => createImportManager(config, storage),
});

app.listen(config.port, () => {
    console.log(`Server running on http://localhost:${config.port}`);
    console.log(`Serving export directory ${config.exportDir}`);
});
