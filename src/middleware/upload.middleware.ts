import multer from "multer";
import path from "path";
import fs from "fs";
import { config } from "../config";

function diskStorage(folder: string) {
  const uploadDir = path.resolve(config.uploadDir, folder);

  if (!fs.existsSync(uploadDir)) {
    fs.mkdirSync(uploadDir, { recursive: true });
  }

  return multer.diskStorage({
    destination: (_, __, cb) => cb(null, uploadDir),

    filename: (_, file, cb) => {
      const unique = Date.now() + "-" + Math.round(Math.random() * 1e9);
      cb(null, unique + path.extname(file.originalname));
    }
  });
}

const imagesOnly: multer.Options["fileFilter"] = (_, file, cb) => {
  cb(null, file.mimetype.startsWith("image/"));
};

export const uploadProfilePhoto = multer({
  storage: diskStorage("profiles"),
  fileFilter: imagesOnly,
  limits: { fileSize: 5 * 1024 * 1024 }
});

export const uploadPatientPhoto = multer({
  storage: diskStorage("patients"),
  fileFilter: imagesOnly,
  limits: { fileSize: 5 * 1024 * 1024 }
});

export const uploadAttachment = multer({
  storage: diskStorage("attachments"),
  limits: { fileSize: config.maxUploadBytes }
});

/** Public URL of a stored upload, served by express.static under /uploads. */
export function uploadUrl(folder: string, file: Express.Multer.File): string {
  return `/uploads/${folder}/${file.filename}`;
}
